import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, ManyToOne, JoinColumn, Index } from 'typeorm';
import { User } from './user.entity';

@Entity('chat_turns')
@Index(['userId', 'studentId', 'createdAt'])
export class ChatTurn {
  @PrimaryGeneratedColumn('increment')
  id!: number;

  @Column()
  userId!: string;

  @Column({ type: 'varchar', nullable: true })
  studentId!: string | null;

  @Column({ type: 'varchar', length: 16 })
  role!: 'user' | 'assistant';

  @Column('text')
  content!: string;

  @Column()
  agent!: string; // 'User', 'System' or the producing agent's name

  @Column({ type: 'varchar', nullable: true })
  label!: string | null;

  // Set by "clear chat"; turns are never deleted.
  @Column({ default: false })
  hidden!: boolean;

  @ManyToOne(() => User, user => user.chatTurns, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'userId' })
  user!: User;

  @CreateDateColumn()
  createdAt!: Date;
}
