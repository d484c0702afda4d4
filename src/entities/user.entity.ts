import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, UpdateDateColumn, OneToMany } from 'typeorm';
import { Student } from './student.entity';
import { ChatTurn } from './chat-turn.entity';

@Entity('users')
export class User {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ unique: true })
  email!: string;

  @Column()
  password!: string; // bcrypt hash

  @Column({ type: 'varchar', nullable: true })
  displayName!: string | null;

  @Column({ type: 'datetime', nullable: true })
  lastLoginAt!: Date | null;

  @OneToMany(() => Student, student => student.user)
  students!: Student[];

  @OneToMany(() => ChatTurn, turn => turn.user)
  chatTurns!: ChatTurn[];

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
