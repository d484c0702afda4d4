import { Controller, Post, UseInterceptors, UploadedFile, UseGuards, HttpCode, HttpStatus } from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { SpeechService } from './speech.service';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';

@Controller('speech')
@UseGuards(JwtAuthGuard)
export class SpeechController {
    constructor(private readonly speechService: SpeechService) {}

    @Post('transcribe')
    @HttpCode(HttpStatus.OK)
    @UseInterceptors(FileInterceptor('file', { limits: { fileSize: 10 * 1024 * 1024 } }))
    async transcribe(@UploadedFile() file: Express.Multer.File | undefined) {
        return this.speechService.transcribe(file);
    }
}
