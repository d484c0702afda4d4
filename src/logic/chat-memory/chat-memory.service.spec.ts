import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { IsNull } from 'typeorm';
import { ChatMemoryService } from './chat-memory.service';
import { ChatTurn } from '../../entities';

describe('ChatMemoryService', () => {
  let service: ChatMemoryService;
  const repository = {
    save: jest.fn(),
    find: jest.fn(),
    update: jest.fn(),
  };

  const row = (id: number, role: 'user' | 'assistant', content: string, at: string) => ({
    id,
    userId: 'u-1',
    studentId: 's-1',
    role,
    content,
    agent: role === 'user' ? 'User' : 'Strategy Agent',
    label: role === 'user' ? null : 'strategy',
    hidden: false,
    createdAt: new Date(at),
  });

  beforeEach(async () => {
    repository.save.mockReset();
    repository.find.mockReset();
    repository.update.mockReset();

    const module: TestingModule = await Test.createTestingModule({
      providers: [ChatMemoryService, { provide: getRepositoryToken(ChatTurn), useValue: repository }],
    }).compile();

    service = module.get<ChatMemoryService>(ChatMemoryService);
  });

  it('appends a turn and returns it as a chat message', async () => {
    repository.save.mockImplementation(async (turn: Partial<ChatTurn>) => ({ ...turn, id: 7, createdAt: new Date('2026-02-01T09:00:00Z') }));

    const message = await service.appendTurn('u-1', 's-1', { role: 'assistant', content: 'Try visual schedules.', agent: 'Strategy Agent', label: 'strategy' });

    expect(repository.save).toHaveBeenCalledWith({
      userId: 'u-1',
      studentId: 's-1',
      role: 'assistant',
      content: 'Try visual schedules.',
      agent: 'Strategy Agent',
      label: 'strategy',
      hidden: false,
    });
    expect(message).toEqual({
      id: 7,
      role: 'assistant',
      content: 'Try visual schedules.',
      agent: 'Strategy Agent',
      label: 'strategy',
      studentId: 's-1',
      ts: Date.parse('2026-02-01T09:00:00Z'),
    });
  });

  it('loads the most recent visible turns oldest first', async () => {
    repository.find.mockResolvedValue([
      row(2, 'assistant', 'second', '2026-02-01T09:00:02Z'),
      row(1, 'user', 'first', '2026-02-01T09:00:01Z'),
    ]);

    const history = await service.loadHistory('u-1', 's-1', { limit: 2 });

    expect(repository.find).toHaveBeenCalledWith({
      where: { userId: 'u-1', studentId: 's-1', hidden: false },
      order: { createdAt: 'DESC', id: 'DESC' },
      take: 2,
    });
    expect(history.map(m => m.content)).toEqual(['first', 'second']);
  });

  it('queries turns without a student using IS NULL and can include hidden ones', async () => {
    repository.find.mockResolvedValue([]);

    await service.loadHistory('u-1', null, { includeHidden: true });

    expect(repository.find).toHaveBeenCalledWith({
      where: { userId: 'u-1', studentId: IsNull() },
      order: { createdAt: 'DESC', id: 'DESC' },
      take: 50,
    });
  });

  it('hides visible turns instead of deleting them', async () => {
    repository.update.mockResolvedValue({ affected: 4, raw: {}, generatedMaps: [] });

    await expect(service.hideHistory('u-1', 's-1')).resolves.toBe(4);
    expect(repository.update).toHaveBeenCalledWith({ userId: 'u-1', studentId: 's-1', hidden: false }, { hidden: true });
  });
});
