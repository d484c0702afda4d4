import { BadRequestException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Student } from '../../entities';
import { DocumentReadError, DocumentsService, UploadedDocument } from '../documents/documents.service';
import { DocumentContext } from '../router/types';
import { PLACEHOLDER_PROFILE, ProfileService } from '../profile/profile.service';
import { CreateStudentDto } from './dto/student.dto';

export interface DocumentSummary {
    studentId: string;
    fileName: string;
    characters: number;
}

@Injectable()
export class StudentsService {
    private readonly logger = new Logger(StudentsService.name);

    constructor(
        @InjectRepository(Student)
        private readonly studentRepository: Repository<Student>,
        private readonly documentsService: DocumentsService,
        private readonly profileService: ProfileService,
    ) {}

    create(userId: string, dto: CreateStudentDto): Promise<Student> {
        return this.studentRepository.save({
            userId,
            name: dto.name?.trim() || PLACEHOLDER_PROFILE.name,
            diagnosis: dto.diagnosis?.trim() || PLACEHOLDER_PROFILE.diagnosis,
            grade: dto.grade?.trim() || PLACEHOLDER_PROFILE.grade,
            iepDate: dto.iepDate?.trim() || PLACEHOLDER_PROFILE.iepDate,
        });
    }

    list(userId: string): Promise<Student[]> {
        return this.studentRepository.find({
            where: { userId },
            order: { createdAt: 'DESC' },
        });
    }

    /** Students are private to their owner; anyone else gets a 404. */
    async getOwned(userId: string, studentId: string): Promise<Student> {
        const student = await this.studentRepository.findOne({ where: { id: studentId, userId } });
        if (!student) {
            throw new NotFoundException(`Student ${studentId} not found`);
        }
        return student;
    }

    async attachDocument(userId: string, studentId: string, file: UploadedDocument | undefined): Promise<DocumentSummary> {
        await this.getOwned(userId, studentId);
        const text = await this.readUpload(file);
        const document = await this.documentsService.saveDocument(studentId, text, file?.originalname ?? 'document');
        return { studentId, fileName: document.fileName, characters: document.text.length };
    }

    /** New case file from an uploaded record: profile fields come from the model. */
    async importFromDocument(userId: string, file: UploadedDocument | undefined): Promise<{ student: Student; document: DocumentSummary }> {
        const text = await this.readUpload(file);
        const profile = await this.profileService.extractProfile(text);
        const student = await this.create(userId, profile);
        let document: DocumentContext;
        try {
            document = await this.documentsService.saveDocument(student.id, text, file?.originalname ?? 'document');
        } catch (error) {
            // a case file is never left without its record
            await this.studentRepository.delete(student.id);
            throw error;
        }
        this.logger.log(`Imported student ${student.id} (${profile.name}) for user ${userId}`);
        return {
            student,
            document: { studentId: student.id, fileName: document.fileName, characters: document.text.length },
        };
    }

    private async readUpload(file: UploadedDocument | undefined): Promise<string> {
        if (!file) {
            throw new BadRequestException('No file uploaded');
        }
        try {
            return await this.documentsService.extractText(file);
        } catch (error) {
            if (error instanceof DocumentReadError) {
                throw new BadRequestException('Could not read document');
            }
            throw error;
        }
    }
}
