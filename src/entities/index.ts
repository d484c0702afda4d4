export { User } from './user.entity';
export { Student } from './student.entity';
export { StudentDocument } from './student-document.entity';
export { ChatTurn } from './chat-turn.entity';
