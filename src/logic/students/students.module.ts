import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Student } from '../../entities';
import { DocumentsModule } from '../documents/documents.module';
import { ProfileModule } from '../profile/profile.module';
import { StudentsService } from './students.service';
import { StudentsController } from './students.controller';

@Module({
    imports: [TypeOrmModule.forFeature([Student]), DocumentsModule, ProfileModule],
    controllers: [StudentsController],
    providers: [StudentsService],
    exports: [StudentsService],
})
export class StudentsModule {}
