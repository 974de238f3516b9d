import { IsDateString, IsIn, IsInt, IsNotEmpty, IsOptional, IsString, MaxLength, Min } from 'class-validator';
import { DIFFICULTY_LEVELS, DifficultyLevel } from '../quizzes/quiz.entity';

export class UpdateQuizDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  title?: string;

  @IsOptional()
  @IsString()
  description?: string;

  @IsOptional()
  @IsIn(DIFFICULTY_LEVELS)
  difficultyLevel?: DifficultyLevel;

  @IsOptional()
  @IsInt()
  @Min(0)
  timeLimit?: number;

  // null clears the deadline
  @IsOptional()
  @IsDateString()
  deadline?: string | null;
}
