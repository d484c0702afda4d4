import { IsNotEmpty, IsOptional, IsString, IsUUID, MaxLength } from 'class-validator';

export class AskDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(4000)
  query!: string;

  @IsOptional()
  @IsUUID()
  studentId?: string;
}

export class HistoryQueryDto {
  @IsOptional()
  @IsUUID()
  studentId?: string;
}

export class ClearDto {
  @IsOptional()
  @IsUUID()
  studentId?: string;
}
