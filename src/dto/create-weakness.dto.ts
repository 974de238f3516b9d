import { IsInt, IsNotEmpty, IsOptional, IsString, MaxLength, Min } from 'class-validator';

export class CreateWeaknessDto {
  @IsInt()
  @Min(1)
  subjectId!: number;

  @IsString()
  @IsNotEmpty({ message: 'Weakness type is required' })
  @MaxLength(100)
  weaknessType!: string;

  @IsOptional()
  @IsString()
  description?: string;
}
