import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { StudentDocument } from '../../entities';
import { extractTextFromBuffer } from '../../utils/textNormalizer';
import { DocumentContext } from '../router/types';

export interface UploadedDocument {
    originalname: string;
    mimetype?: string;
    buffer: Buffer;
}

export class DocumentReadError extends Error {
    constructor(readonly fileName: string, readonly reason: string) {
        super(`Could not read document ${fileName}: ${reason}`);
        this.name = 'DocumentReadError';
    }
}

@Injectable()
export class DocumentsService {
    private readonly logger = new Logger(DocumentsService.name);

    constructor(
        @InjectRepository(StudentDocument)
        private readonly documentRepository: Repository<StudentDocument>,
    ) {}

    /** All-or-nothing: any extraction problem is a DocumentReadError, never partial text. */
    async extractText(file: UploadedDocument): Promise<string> {
        let text: string;
        try {
            text = await extractTextFromBuffer(file.buffer, file.originalname, file.mimetype);
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            this.logger.warn(`Extraction failed for ${file.originalname}: ${reason}`);
            throw new DocumentReadError(file.originalname, reason);
        }
        if (!text) {
            throw new DocumentReadError(file.originalname, 'no text found');
        }
        return text;
    }

    async saveDocument(studentId: string, text: string, fileName: string): Promise<DocumentContext> {
        // Last write wins; there is exactly one document per student.
        await this.documentRepository.save({ studentId, fileName, text, characters: text.length });
        const saved = await this.documentRepository.findOne({ where: { studentId } });
        this.logger.log(`Stored ${text.length} characters from ${fileName} for student ${studentId}`);
        return {
            studentId,
            fileName,
            text,
            updatedAt: saved?.updatedAt ?? new Date(),
        };
    }

    async loadDocument(studentId: string): Promise<DocumentContext | null> {
        const row = await this.documentRepository.findOne({ where: { studentId } });
        if (!row) return null;
        return {
            studentId: row.studentId,
            fileName: row.fileName,
            text: row.text,
            updatedAt: row.updatedAt,
        };
    }
}
