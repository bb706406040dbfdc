import { Type } from 'class-transformer';
import { IsEnum, IsIn, IsInt, IsOptional, Max, Min } from 'class-validator';
import { AnalysisMode } from '../../screening/engine';
import { SCENARIO_CATEGORIES } from '../scenario-catalog';

export class ScenarioFilterDto {
  @IsIn(SCENARIO_CATEGORIES)
  @IsOptional()
  category?: string;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(3)
  @IsOptional()
  difficulty?: number;
}

export class RunScenariosDto extends ScenarioFilterDto {
  @IsEnum(AnalysisMode)
  @IsOptional()
  mode?: AnalysisMode;
}

export class RunScenarioQueryDto {
  @IsEnum(AnalysisMode)
  @IsOptional()
  mode?: AnalysisMode;
}
