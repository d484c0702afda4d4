import { BadRequestException, Controller, HttpCode, HttpStatus, Post, UploadedFile, UseGuards, UseInterceptors } from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { AnalyticsService } from './analytics.service';

@Controller('analytics')
@UseGuards(JwtAuthGuard)
export class AnalyticsController {
    constructor(private readonly analyticsService: AnalyticsService) {}

    @Post('csv')
    @HttpCode(HttpStatus.OK)
    @UseInterceptors(FileInterceptor('file', { limits: { fileSize: 5 * 1024 * 1024 } }))
    chartCsv(@UploadedFile() file: Express.Multer.File | undefined) {
        if (!file) {
            throw new BadRequestException('No file uploaded');
        }
        return this.analyticsService.parseCsv(file.buffer.toString('utf8'));
    }
}
