import { IsString, IsNotEmpty, IsOptional, MaxLength } from 'class-validator';

export class CreateSubjectDto {
  @IsString()
  @IsNotEmpty({ message: 'Subject name is required' })
  @MaxLength(100)
  name!: string;

  @IsOptional()
  @IsString()
  description?: string;
}
