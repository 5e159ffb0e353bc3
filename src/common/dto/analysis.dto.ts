import 'reflect-metadata';
import {
  IsBoolean,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Max,
  MaxLength,
  Min,
} from 'class-validator';
import { Transform } from 'class-transformer';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

// Query strings arrive as text; "false" must not become true
const toBoolean = ({ obj, key }: { obj: Record<string, unknown>; key: string }) => {
  const raw = obj[key];
  return raw === true || raw === 'true' || raw === '1';
};

export class AnalyzeOptionsDto {
  @ApiPropertyOptional({
    description: 'Role profile id to evaluate against',
    example: 'backend-developer',
  })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  targetRole?: string;

  @ApiPropertyOptional({
    description: 'Request an AI-written narrative in addition to the scores',
    example: false,
  })
  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  includeNarrative?: boolean;

  @ApiPropertyOptional({
    description: 'Upper bound for the AI narrative call in milliseconds',
    example: 8000,
  })
  @IsOptional()
  @IsInt()
  @Min(100)
  @Max(60000)
  narrativeTimeoutMs?: number;
}

export class AnalyzeTextDto extends AnalyzeOptionsDto {
  @ApiProperty({
    description: 'Plain resume text, one line per row',
    example: 'Jane Doe\njane.doe@example.com\n\nEXPERIENCE\n...',
  })
  @IsString()
  @IsNotEmpty()
  @MaxLength(200000)
  text!: string;

  @ApiPropertyOptional({
    description: 'Whether the upstream extractor judged the text readable',
    default: true,
  })
  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  readable?: boolean;
}
