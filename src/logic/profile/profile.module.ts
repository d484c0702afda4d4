import { Module } from '@nestjs/common';
import { GeminiModule } from '../gemini/gemini.module';
import { ProfileService } from './profile.service';

@Module({
    imports: [GeminiModule],
    providers: [ProfileService],
    exports: [ProfileService],
})
export class ProfileModule {}
