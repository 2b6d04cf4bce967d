import { Module } from '@nestjs/common';
import { CoachService } from './coach.service';
import { CoachController } from './coach.controller';
import { RANDOM_SOURCE } from './coach.constants';
import { JournalModule } from '../journal/journal.module';
import { RiskAssessmentModule } from '../risk-assessment/risk-assessment.module';

@Module({
  imports: [JournalModule, RiskAssessmentModule],
  providers: [CoachService, { provide: RANDOM_SOURCE, useValue: Math.random }],
  controllers: [CoachController],
})
export class CoachModule {}
