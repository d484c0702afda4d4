import { IsOptional, IsString, MaxLength } from 'class-validator';

export class CreateStudentDto {
  @IsOptional()
  @IsString()
  @MaxLength(200)
  name?: string;

  @IsOptional()
  @IsString()
  diagnosis?: string;

  @IsOptional()
  @IsString()
  grade?: string;

  @IsOptional()
  @IsString()
  iepDate?: string;
}
