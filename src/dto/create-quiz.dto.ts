import { Type } from 'class-transformer';
import {
  ArrayMaxSize,
  ArrayMinSize,
  IsArray,
  IsDateString,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Max,
  MaxLength,
  Min,
  ValidateNested,
} from 'class-validator';
import { DIFFICULTY_LEVELS, DifficultyLevel } from '../quizzes/quiz.entity';

export const OPTIONS_PER_QUESTION = 4;

export class CreateQuestionDto {
  @IsString()
  @IsNotEmpty()
  questionText!: string;

  @IsArray()
  @ArrayMinSize(OPTIONS_PER_QUESTION)
  @ArrayMaxSize(OPTIONS_PER_QUESTION)
  @IsString({ each: true })
  options!: string[];

  @IsInt()
  @Min(1)
  @Max(OPTIONS_PER_QUESTION)
  correctOption!: number;

  @IsOptional()
  @IsString()
  explanation?: string;
}

export class CreateQuizDto {
  @IsInt()
  @Min(1)
  subjectId!: number;

  @IsString()
  @IsNotEmpty({ message: 'Quiz title is required' })
  @MaxLength(255)
  title!: string;

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

  @IsOptional()
  @IsDateString()
  deadline?: string;

  @IsArray()
  @ArrayMinSize(1)
  @ValidateNested({ each: true })
  @Type(() => CreateQuestionDto)
  questions!: CreateQuestionDto[];
}
