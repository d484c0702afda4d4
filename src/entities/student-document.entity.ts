import { Entity, PrimaryColumn, Column, UpdateDateColumn, OneToOne, JoinColumn } from 'typeorm';
import { Student } from './student.entity';

// One row per student; a new upload overwrites the previous text.
@Entity('student_documents')
export class StudentDocument {
  @PrimaryColumn()
  studentId!: string;

  @Column()
  fileName!: string;

  @Column('longtext')
  text!: string;

  @Column()
  characters!: number;

  @OneToOne(() => Student, student => student.document, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'studentId' })
  student!: Student;

  @UpdateDateColumn()
  updatedAt!: Date;
}
