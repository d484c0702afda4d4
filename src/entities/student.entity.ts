import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, UpdateDateColumn, ManyToOne, OneToOne, JoinColumn, Index } from 'typeorm';
import { User } from './user.entity';
import { StudentDocument } from './student-document.entity';

@Entity('students')
export class Student {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Index()
  @Column()
  userId!: string;

  @Column()
  name!: string;

  @Column({ default: 'Not Found' })
  diagnosis!: string;

  @Column({ default: 'N/A' })
  grade!: string;

  @Column({ default: 'N/A' })
  iepDate!: string; // as written in the record, not parsed

  @ManyToOne(() => User, user => user.students, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'userId' })
  user!: User;

  @OneToOne(() => StudentDocument, document => document.student)
  document!: StudentDocument;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
