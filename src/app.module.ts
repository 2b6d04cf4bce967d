import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { rulesConfig } from './config/rules.config';
import { RiskAssessmentModule } from './risk-assessment/risk-assessment.module';
import { JournalModule } from './journal/journal.module';
import { CoachModule } from './coach/coach.module';
import { SessionModule } from './session/session.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [rulesConfig],
    }),
    ScheduleModule.forRoot(),
    RiskAssessmentModule,
    SessionModule,
    JournalModule,
    CoachModule,
  ],
})
export class AppModule {}
