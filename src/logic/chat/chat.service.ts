import { BadRequestException, Injectable } from '@nestjs/common';
import { ChatMemoryService } from '../chat-memory/chat-memory.service';
import { ChatMessage } from '../chat-memory/types';
import { DocumentsService } from '../documents/documents.service';
import { StudentsService } from '../students/students.service';
import { RouterService } from '../router/router.service';
import { ClassificationResult, SessionContext } from '../router/types';
import { RoutingLabel } from '../router/routing-label';
import { CHAT_CLEARED_EVENT, CHAT_TURN_EVENT, SocketGateway } from '../socket-gateway/socket.gateway';
import { AuthUser } from '../auth/types';
import { AskDto } from './dto/chat.dto';

export interface ChatReply {
    label: RoutingLabel;
    classification: ClassificationResult['status'];
    agent: string;
    response: string;
    turns: ChatMessage[];
}

@Injectable()
export class ChatService {

    constructor(
        private readonly chatMemoryService: ChatMemoryService,
        private readonly documentsService: DocumentsService,
        private readonly studentsService: StudentsService,
        private readonly routerService: RouterService,
        private readonly socketGateway: SocketGateway,
    ) { }

    async ask(body: AskDto, user: AuthUser): Promise<ChatReply> {
        const query = body.query?.trim();
        if (!query) {
            throw new BadRequestException('Query is required');
        }
        const studentId = body.studentId ?? null;

        const session = await this.buildSession(user, studentId);

        const userTurn = await this.chatMemoryService.appendTurn(user.id, studentId, {
            role: 'user',
            content: query,
            agent: 'User',
        });
        this.socketGateway.emitToUser(user.id, CHAT_TURN_EVENT, userTurn);

        const { classification, result } = await this.routerService.route(query, session);

        const assistantTurn = await this.chatMemoryService.appendTurn(user.id, studentId, {
            role: 'assistant',
            content: result.responseText,
            agent: result.producingAgent,
            label: classification.label,
        });
        this.socketGateway.emitToUser(user.id, CHAT_TURN_EVENT, assistantTurn);

        return {
            label: classification.label,
            classification: classification.status,
            agent: result.producingAgent,
            response: result.responseText,
            turns: [userTurn, assistantTurn],
        };
    }

    async getHistory(user: AuthUser, studentId?: string): Promise<ChatMessage[]> {
        if (studentId) {
            await this.studentsService.getOwned(user.id, studentId);
        }
        return this.chatMemoryService.loadHistory(user.id, studentId ?? null);
    }

    async clearHistory(user: AuthUser, studentId?: string): Promise<{ hidden: number }> {
        if (studentId) {
            await this.studentsService.getOwned(user.id, studentId);
        }
        const hidden = await this.chatMemoryService.hideHistory(user.id, studentId ?? null);
        this.socketGateway.emitToUser(user.id, CHAT_CLEARED_EVENT, { studentId: studentId ?? null });
        return { hidden };
    }

    private async buildSession(user: AuthUser, studentId: string | null): Promise<SessionContext> {
        if (!studentId) {
            return { userId: user.id };
        }

        await this.studentsService.getOwned(user.id, studentId);
        const document = await this.documentsService.loadDocument(studentId);
        return {
            userId: user.id,
            studentId,
            document: document ?? undefined,
        };
    }
}
