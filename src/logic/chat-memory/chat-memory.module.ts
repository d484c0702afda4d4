import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ChatTurn } from '../../entities';
import { ChatMemoryService } from './chat-memory.service';

@Module({
    imports: [TypeOrmModule.forFeature([ChatTurn])],
    exports: [ChatMemoryService],
    providers: [ChatMemoryService],
})
export class ChatMemoryModule {}
