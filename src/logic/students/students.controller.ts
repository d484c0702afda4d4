import { Body, Controller, Get, Param, ParseUUIDPipe, Post, Request, UploadedFile, UseGuards, UseInterceptors } from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { AuthUser } from '../auth/types';
import { StudentsService } from './students.service';
import { CreateStudentDto } from './dto/student.dto';

const MAX_DOCUMENT_BYTES = 20 * 1024 * 1024;

@Controller('students')
@UseGuards(JwtAuthGuard)
export class StudentsController {
    constructor(private readonly studentsService: StudentsService) {}

    @Post()
    create(@Request() req: { user: AuthUser }, @Body() body: CreateStudentDto) {
        return this.studentsService.create(req.user.id, body);
    }

    @Get()
    list(@Request() req: { user: AuthUser }) {
        return this.studentsService.list(req.user.id);
    }

    @Get(':id')
    get(@Request() req: { user: AuthUser }, @Param('id', ParseUUIDPipe) id: string) {
        return this.studentsService.getOwned(req.user.id, id);
    }

    @Post('import')
    @UseInterceptors(FileInterceptor('file', { limits: { fileSize: MAX_DOCUMENT_BYTES } }))
    importFromDocument(@Request() req: { user: AuthUser }, @UploadedFile() file: Express.Multer.File | undefined) {
        return this.studentsService.importFromDocument(req.user.id, file);
    }

    @Post(':id/document')
    @UseInterceptors(FileInterceptor('file', { limits: { fileSize: MAX_DOCUMENT_BYTES } }))
    uploadDocument(
        @Request() req: { user: AuthUser },
        @Param('id', ParseUUIDPipe) id: string,
        @UploadedFile() file: Express.Multer.File | undefined,
    ) {
        return this.studentsService.attachDocument(req.user.id, id, file);
    }
}
