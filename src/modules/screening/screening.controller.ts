import { Body, Controller, Get, HttpCode, HttpStatus, Patch, Post } from '@nestjs/common';
import { ScreeningService } from './screening.service';
import { ClassifyDto } from './dto/classify.dto';
import { IncomingCallDto } from './dto/incoming-call.dto';
import { UpdateSettingsDto } from './dto/update-settings.dto';
import { AnalysisMode, MODE_LABELS } from './engine';

@Controller('screening')
export class ScreeningController {
  constructor(private readonly screeningService: ScreeningService) {}

  @Post('classify')
  @HttpCode(HttpStatus.OK)
  classify(@Body() classifyDto: ClassifyDto) {
    return this.screeningService.classify(classifyDto.phoneNumber, classifyDto.mode);
  }

  @Post('calls')
  screenCall(@Body() incomingCallDto: IncomingCallDto) {
    return this.screeningService.screenIncomingCall(incomingCallDto.phoneNumber, {
      contactName: incomingCallDto.contactName,
    });
  }

  @Get('calls')
  getRecentCalls() {
    return this.screeningService.getRecentCalls();
  }

  @Get('threats')
  getThreats() {
    return this.screeningService.getThreats();
  }

  @Get('stats')
  getStats() {
    return this.screeningService.getStats();
  }

  @Get('settings')
  getSettings() {
    return this.screeningService.getSettings();
  }

  @Patch('settings')
  updateSettings(@Body() updateSettingsDto: UpdateSettingsDto) {
    return this.screeningService.updateSettings(updateSettingsDto);
  }

  @Post('protection/toggle')
  @HttpCode(HttpStatus.OK)
  toggleProtection() {
    return this.screeningService.toggleProtection();
  }

  @Post('reset')
  @HttpCode(HttpStatus.OK)
  reset() {
    return this.screeningService.reset();
  }

  @Get('modes')
  getModes() {
    return Object.values(AnalysisMode).map((mode) => ({
      mode,
      ...MODE_LABELS[mode],
    }));
  }
}
