import { Module } from '@nestjs/common';
import { RiskAssessmentService } from './risk-assessment.service';
import { RiskAssessmentController } from './risk-assessment.controller';
import { RuleConfigService } from './services/rule-config.service';
import { HardStopGateService } from './services/hard-stop-gate.service';
import { ScoreEngineService } from './services/score-engine.service';
import { RiskDeciderService } from './services/risk-decider.service';
import { AnswerValidatorService } from './services/answer-validator.service';

@Module({
  providers: [
    RiskAssessmentService,
    RuleConfigService,
    HardStopGateService,
    ScoreEngineService,
    RiskDeciderService,
    AnswerValidatorService,
  ],
  controllers: [RiskAssessmentController],
  exports: [RiskAssessmentService, RuleConfigService, AnswerValidatorService],
})
export class RiskAssessmentModule {}
