import { IsNotEmpty, IsString } from 'class-validator';

/**
 * Request body for POST /api/ai/sentiment and POST /api/ai/intent
 */
export class TextAnalysisDto {
  @IsString()
  @IsNotEmpty()
  text!: string;
}
