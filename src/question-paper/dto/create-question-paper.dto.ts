import { Transform } from 'class-transformer';
import {
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Max,
  Min,
} from 'class-validator';
import { MAX_TARGET_COUNT } from '../question-paper.service';

const trim = ({ value }: { value: unknown }): unknown =>
  typeof value === 'string' ? value.trim() : value;

export class CreateQuestionPaperDto {
  @Transform(trim)
  @IsString()
  @IsNotEmpty()
  topic!: string;

  @Transform(trim)
  @IsString()
  @IsNotEmpty()
  level!: string;

  @IsOptional()
  @Transform(({ value }) => (value === undefined ? value : Number(value)))
  @IsInt()
  @Min(1)
  @Max(MAX_TARGET_COUNT)
  count?: number;
}
