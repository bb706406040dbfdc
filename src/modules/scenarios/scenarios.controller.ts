import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Post,
  Query,
} from '@nestjs/common';
import { ScenariosService } from './scenarios.service';
import {
  RunScenarioQueryDto,
  RunScenariosDto,
  ScenarioFilterDto,
} from './dto/scenario-filter.dto';

@Controller('scenarios')
export class ScenariosController {
  constructor(private readonly scenariosService: ScenariosService) {}

  @Get()
  list(@Query() filter: ScenarioFilterDto) {
    return this.scenariosService.list(filter);
  }

  @Get('categories')
  categories() {
    return this.scenariosService.categories();
  }

  @Get('results')
  getResults() {
    return this.scenariosService.getResults();
  }

  @Delete('results')
  @HttpCode(HttpStatus.NO_CONTENT)
  clearResults() {
    this.scenariosService.clearResults();
  }

  @Post('run')
  @HttpCode(HttpStatus.OK)
  runMany(@Body() runScenariosDto: RunScenariosDto) {
    const { mode, ...filter } = runScenariosDto;
    return this.scenariosService.runMany(filter, mode);
  }

  @Post(':id/run')
  @HttpCode(HttpStatus.OK)
  runOne(
    @Param('id', ParseIntPipe) id: number,
    @Query() query: RunScenarioQueryDto,
  ) {
    return this.scenariosService.runScenario(id, query.mode);
  }
}
