import { Module } from '@nestjs/common';
import { JournalService } from './journal.service';
import { JournalController } from './journal.controller';
import { RiskAssessmentModule } from '../risk-assessment/risk-assessment.module';

@Module({
  imports: [RiskAssessmentModule],
  providers: [JournalService],
  controllers: [JournalController],
  exports: [JournalService],
})
export class JournalModule {}
