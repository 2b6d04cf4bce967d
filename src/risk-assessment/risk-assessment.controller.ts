import { Body, Controller, Get, Post } from '@nestjs/common';
import { ZodValidationPipe } from '../common/zod-validation.pipe';
import { RiskAssessmentService } from './risk-assessment.service';
import { AnswerValidatorService } from './services/answer-validator.service';
import { formatDecision } from './services/decision-formatter';
import { EvaluateRequest, evaluateRequestSchema } from './dto/evaluate-request.dto';

@Controller('risk-assessment')
export class RiskAssessmentController {
  constructor(
    private riskAssessmentService: RiskAssessmentService,
    private answerValidator: AnswerValidatorService,
  ) {}

  /**
   * Questions grouped by category, in the order they should be asked
   */
  @Get('questions')
  getQuestions() {
    return {
      success: true,
      data: this.riskAssessmentService.questionsByCategory(),
      timestamp: new Date().toISOString(),
    };
  }

  /**
   * Run the full decision for one self-assessment
   */
  @Post('evaluate')
  evaluate(@Body(new ZodValidationPipe(evaluateRequestSchema)) body: EvaluateRequest) {
    this.answerValidator.validate(body.answers);

    const decision = this.riskAssessmentService.evaluate(body.answers, body.stats, body.tradeDetails);

    return {
      success: true,
      data: decision,
      summary: formatDecision(decision),
      timestamp: new Date().toISOString(),
    };
  }
}
