import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { IsNull, Repository } from 'typeorm';
import { ChatTurn } from '../../entities';
import { ChatMessage, HistoryOptions, NewTurn } from './types';

@Injectable()
export class ChatMemoryService {

  private MAX_MESSAGES = 50;   // history page size

  constructor(
    @InjectRepository(ChatTurn)
    private readonly chatTurnRepository: Repository<ChatTurn>,
  ) { }

  async appendTurn(userId: string, studentId: string | null, turn: NewTurn): Promise<ChatMessage> {
    const saved = await this.chatTurnRepository.save({
      userId,
      studentId,
      role: turn.role,
      content: turn.content,
      agent: turn.agent,
      label: turn.label ?? null,
      hidden: false,
    });
    return this.toMessage(saved);
  }

  /** Oldest first; with a limit, the most recent `limit` turns. */
  async loadHistory(userId: string, studentId: string | null, options: HistoryOptions = {}): Promise<ChatMessage[]> {
    const limit = options.limit ?? this.MAX_MESSAGES;
    const turns = await this.chatTurnRepository.find({
      where: {
        userId,
        studentId: studentId ?? IsNull(),
        ...(options.includeHidden ? {} : { hidden: false }),
      },
      order: { createdAt: 'DESC', id: 'DESC' },
      take: limit,
    });
    return turns.reverse().map(turn => this.toMessage(turn));
  }

  /** Clearing only hides turns from the visible history; nothing is deleted. */
  async hideHistory(userId: string, studentId: string | null): Promise<number> {
    const result = await this.chatTurnRepository.update(
      { userId, studentId: studentId ?? IsNull(), hidden: false },
      { hidden: true },
    );
    return result.affected ?? 0;
  }

  private toMessage(turn: Pick<ChatTurn, 'id' | 'role' | 'content' | 'agent' | 'label' | 'studentId' | 'createdAt'>): ChatMessage {
    return {
      id: turn.id,
      role: turn.role,
      content: turn.content,
      agent: turn.agent,
      label: turn.label,
      studentId: turn.studentId,
      ts: turn.createdAt.getTime(),
    };
  }
}
