import { IsEnum, IsOptional, IsString, MaxLength } from 'class-validator';
import { AnalysisMode } from '../engine';

export const MAX_PHONE_INPUT_LENGTH = 64;

export class ClassifyDto {
  // No format check: "unknown" and "#31#+7..." are engine input too.
  @IsString()
  @MaxLength(MAX_PHONE_INPUT_LENGTH)
  phoneNumber!: string;

  @IsEnum(AnalysisMode, {
    message: `mode must be one of: ${Object.values(AnalysisMode).join(', ')}`,
  })
  @IsOptional()
  mode?: AnalysisMode;
}
