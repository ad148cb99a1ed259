import {
  IsArray,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  Min,
} from 'class-validator';

/**
 * Request body for POST /api/ai/deal-insights
 */
export class DealInsightsDto {
  @IsString()
  @IsNotEmpty()
  title!: string;

  @IsNumber()
  @Min(0)
  value!: number;

  @IsString()
  @IsNotEmpty()
  stage!: string;

  @IsNumber()
  @Min(0)
  @Max(1)
  probability!: number;

  @IsOptional()
  @IsString()
  customer_name?: string;

  @IsOptional()
  @IsString()
  customer_status?: string;

  @IsOptional()
  @IsInt()
  @Min(0)
  recent_interactions?: number = 0;
}

/**
 * Request body for POST /api/ai/next-actions
 */
export class NextActionsDto {
  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsString()
  @IsNotEmpty()
  status!: string;

  @IsOptional()
  @IsString()
  company?: string;

  @IsOptional()
  @IsInt()
  @Min(0)
  recent_messages?: number = 0;

  @IsOptional()
  @IsString()
  last_contact_date?: string;
}

/**
 * Request body for POST /api/ai/customer-sentiment
 * Message contents, most recent first.
 */
export class CustomerSentimentDto {
  @IsArray()
  @IsString({ each: true })
  messages!: string[];
}
