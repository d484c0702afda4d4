import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { StudentDocument } from '../../entities';
import { DocumentsService } from './documents.service';

@Module({
    imports: [TypeOrmModule.forFeature([StudentDocument])],
    providers: [DocumentsService],
    exports: [DocumentsService],
})
export class DocumentsModule {}
