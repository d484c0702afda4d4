import { Module } from '@nestjs/common';
import { ChatService } from './chat.service';
import { ChatController } from './chat.controller';
import { ChatMemoryModule } from '../chat-memory/chat-memory.module';
import { DocumentsModule } from '../documents/documents.module';
import { StudentsModule } from '../students/students.module';
import { RoutingModule } from '../router/router.module';
import { SocketGatewayModule } from '../socket-gateway/socket-gateway.module';

@Module({
    imports: [
        ChatMemoryModule,
        DocumentsModule,
        StudentsModule,
        RoutingModule,
        SocketGatewayModule,
    ],
    controllers: [ChatController],
    providers: [ChatService],
    exports: [ChatService],
})
export class ChatModule {}
