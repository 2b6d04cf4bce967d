import { Module } from '@nestjs/common';
import { SessionService } from './session.service';
import { SessionController } from './session.controller';
import { RiskAssessmentModule } from '../risk-assessment/risk-assessment.module';
import { JournalModule } from '../journal/journal.module';

@Module({
  imports: [RiskAssessmentModule, JournalModule],
  providers: [SessionService],
  controllers: [SessionController],
})
export class SessionModule {}
