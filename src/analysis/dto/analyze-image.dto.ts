import { IsBoolean, IsOptional } from 'class-validator';
import { Transform } from 'class-transformer';
import { ApiProperty } from '@nestjs/swagger';

export class AnalyzeImageDto {
  @ApiProperty({
    description: 'Confirms the user has read and accepted the privacy policy',
    example: true,
  })
  @IsOptional()
  @IsBoolean()
  // Multipart fields arrive as strings; read the raw value so "false" stays false
  @Transform(({ obj, key }) => obj[key] === true || obj[key] === 'true')
  privacyPolicyAccepted?: boolean;
}
