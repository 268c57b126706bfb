import { IsObject, IsOptional } from 'class-validator';
import { ApiPropertyOptional } from '@nestjs/swagger';

export class RunCommandDto {
  @ApiPropertyOptional({
    description: 'Command arguments; each command validates its own shape',
    example: { url: 'https://example.com/live' },
    type: 'object',
    additionalProperties: true,
  })
  @IsOptional()
  @IsObject()
  args?: Record<string, unknown>;
}
