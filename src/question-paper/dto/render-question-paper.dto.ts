import { IsNotEmpty, IsOptional, IsString } from 'class-validator';

export class RenderQuestionPaperDto {
  @IsString()
  @IsNotEmpty()
  metadataPath!: string;

  @IsOptional()
  @IsString()
  topic?: string;

  @IsOptional()
  @IsString()
  level?: string;
}
