import { Type } from 'class-transformer';
import {
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Min,
} from 'class-validator';

/**
 * GenerateDto
 * Request body for POST /api/ai/generate
 */
export class GenerateDto {
  @IsString()
  @IsNotEmpty()
  prompt!: string;

  /** openai, claude, gemini, groq, ollama */
  @IsOptional()
  @IsString()
  provider?: string;

  @IsOptional()
  @IsNumber()
  temperature?: number = 0.7;

  @IsOptional()
  @IsInt()
  @Min(1)
  max_tokens?: number = 1000;

  @IsOptional()
  @IsString()
  system_prompt?: string;
}

/**
 * StreamGenerateQueryDto
 * Query string for GET /api/ai/generate/stream (Server-Sent Events)
 */
export class StreamGenerateQueryDto {
  @IsString()
  @IsNotEmpty()
  prompt!: string;

  @IsOptional()
  @IsString()
  provider?: string;

  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  temperature?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  max_tokens?: number;
}

/**
 * GenerateResponseDto
 * Response body for POST /api/ai/generate
 */
export class GenerateResponseDto {
  response!: string;
  provider!: string;
  model!: string;
}
