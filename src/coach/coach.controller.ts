import { Controller, Get } from '@nestjs/common';
import { CoachService } from './coach.service';

@Controller('coach')
export class CoachController {
  constructor(private coachService: CoachService) {}

  @Get('insights')
  getInsights() {
    return {
      success: true,
      data: this.coachService.getInsights(),
      timestamp: new Date().toISOString(),
    };
  }

  @Get('weekly-report')
  getWeeklyReport() {
    return {
      success: true,
      data: this.coachService.weeklyReport(),
      timestamp: new Date().toISOString(),
    };
  }
}
