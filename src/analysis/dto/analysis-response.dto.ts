import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { VERDICT_MESSAGES, VerdictMessage } from '../constants/messages';

export class DetectionBoxDto {
  @ApiPropertyOptional({ example: 10 })
  x1?: number | null;

  @ApiPropertyOptional({ example: 10 })
  y1?: number | null;

  @ApiPropertyOptional({ example: 50 })
  x2?: number | null;

  @ApiPropertyOptional({ example: 50 })
  y2?: number | null;
}

export class DetectionDto {
  @ApiPropertyOptional({ example: 'Stone' })
  name?: string | null;

  @ApiPropertyOptional({ example: 0.9, minimum: 0, maximum: 1 })
  confidence?: number | null;

  @ApiPropertyOptional({ type: DetectionBoxDto })
  box?: DetectionBoxDto | null;
}

export class AnalysisResponseDto {
  @ApiProperty({
    enum: Object.values(VERDICT_MESSAGES),
    example: VERDICT_MESSAGES.STONE_DETECTED,
  })
  message!: VerdictMessage;

  @ApiProperty({ description: 'True when a kidney stone was detected' })
  isPositive!: boolean;

  @ApiProperty({ type: [DetectionDto] })
  detections!: DetectionDto[];

  @ApiProperty({
    description: 'Annotated image as a PNG data URI',
    example: 'data:image/png;base64,iVBORw0KGgo...',
  })
  annotatedImage!: string;

  @ApiProperty({
    description: 'Raw output of the detection model',
    type: 'object',
    additionalProperties: true,
  })
  rawResponse!: Record<string, unknown>;
}

export class PrivacyPolicySectionDto {
  @ApiProperty()
  heading!: string;

  @ApiProperty()
  body!: string;
}

export class PrivacyPolicyResponseDto {
  @ApiProperty({ example: 'Data Storage Disclaimer' })
  title!: string;

  @ApiProperty({ type: [PrivacyPolicySectionDto] })
  sections!: PrivacyPolicySectionDto[];
}
