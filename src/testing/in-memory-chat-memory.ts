import { ChatMessage, HistoryOptions, NewTurn } from '../logic/chat-memory/types';

interface StoredTurn extends ChatMessage {
    userId: string;
    hidden: boolean;
}

/** Array-backed stand-in for ChatMemoryService with the same ordering and hiding rules. */
export class InMemoryChatMemory {
    readonly turns: StoredTurn[] = [];
    private clock = Date.parse('2026-01-01T00:00:00Z');

    async appendTurn(userId: string, studentId: string | null, turn: NewTurn): Promise<ChatMessage> {
        const stored: StoredTurn = {
            id: this.turns.length + 1,
            userId,
            studentId,
            role: turn.role,
            content: turn.content,
            agent: turn.agent,
            label: turn.label ?? null,
            hidden: false,
            ts: this.clock++,
        };
        this.turns.push(stored);
        return this.toMessage(stored);
    }

    async loadHistory(userId: string, studentId: string | null, options: HistoryOptions = {}): Promise<ChatMessage[]> {
        const visible = this.turns.filter(
            turn => turn.userId === userId && turn.studentId === studentId && (options.includeHidden || !turn.hidden),
        );
        const limit = options.limit ?? 50;
        return visible.slice(Math.max(0, visible.length - limit)).map(turn => this.toMessage(turn));
    }

    async hideHistory(userId: string, studentId: string | null): Promise<number> {
        let hidden = 0;
        for (const turn of this.turns) {
            if (turn.userId === userId && turn.studentId === studentId && !turn.hidden) {
                turn.hidden = true;
                hidden++;
            }
        }
        return hidden;
    }

    private toMessage({ userId: _userId, hidden: _hidden, ...message }: StoredTurn): ChatMessage {
        return message;
    }
}
