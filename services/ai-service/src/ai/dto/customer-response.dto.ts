import { IsIn, IsNotEmpty, IsObject, IsOptional, IsString } from 'class-validator';
import { RESPONSE_TONES, ResponseTone } from '../../insights/types';

/**
 * Request body for POST /api/ai/generate-response
 */
export class CustomerResponseDto {
  @IsString()
  @IsNotEmpty()
  customer_message!: string;

  @IsOptional()
  @IsObject()
  context?: Record<string, unknown>;

  @IsOptional()
  @IsIn(RESPONSE_TONES)
  tone?: ResponseTone = 'professional';
}
