import { IsBoolean, IsEnum, IsOptional } from 'class-validator';
import { AnalysisMode } from '../engine';

export class UpdateSettingsDto {
  @IsBoolean()
  @IsOptional()
  protectionActive?: boolean;

  @IsEnum(AnalysisMode)
  @IsOptional()
  mode?: AnalysisMode;
}
