import { Body, Controller, Delete, Param, Post } from '@nestjs/common';
import { ZodValidationPipe } from '../common/zod-validation.pipe';
import { formatBreakdown, formatDecision } from '../risk-assessment/services/decision-formatter';
import { AssessmentSession } from './assessment-session';
import { SessionService } from './session.service';
import {
  SessionEvaluateRequest,
  sessionEvaluateSchema,
  SessionJournalRequest,
  sessionJournalSchema,
  SessionReplyRequest,
  sessionReplySchema,
  StartSessionRequest,
  startSessionSchema,
} from './dto/session-request.dto';

function sessionView(session: AssessmentSession) {
  const question = session.currentQuestion();
  return {
    sessionId: session.id,
    progress: session.progress(),
    complete: session.isComplete(),
    question: question
      ? { id: question.id, text: question.text, kind: question.kind, min: question.min, max: question.max }
      : null,
  };
}

@Controller('sessions')
export class SessionController {
  constructor(private sessionService: SessionService) {}

  @Post()
  start(@Body(new ZodValidationPipe(startSessionSchema)) body: StartSessionRequest) {
    const session = this.sessionService.start(body.stats);
    return {
      success: true,
      data: sessionView(session),
      timestamp: new Date().toISOString(),
    };
  }

  @Post(':id/answers')
  answer(@Param('id') id: string, @Body(new ZodValidationPipe(sessionReplySchema)) body: SessionReplyRequest) {
    const session = this.sessionService.answer(id, body.reply);
    return {
      success: true,
      data: sessionView(session),
      timestamp: new Date().toISOString(),
    };
  }

  @Post(':id/evaluate')
  evaluate(
    @Param('id') id: string,
    @Body(new ZodValidationPipe(sessionEvaluateSchema)) body: SessionEvaluateRequest,
  ) {
    const decision = this.sessionService.evaluate(id, body.tradeDetails);
    return {
      success: true,
      data: decision,
      summary: formatDecision(decision),
      breakdown: formatBreakdown(decision),
      timestamp: new Date().toISOString(),
    };
  }

  @Post(':id/journal')
  saveToJournal(
    @Param('id') id: string,
    @Body(new ZodValidationPipe(sessionJournalSchema)) body: SessionJournalRequest,
  ) {
    return {
      success: true,
      data: this.sessionService.saveToJournal(id, body.notes),
      timestamp: new Date().toISOString(),
    };
  }

  @Delete(':id')
  cancel(@Param('id') id: string) {
    this.sessionService.cancel(id);
    return {
      success: true,
      message: 'Session cancelled',
      timestamp: new Date().toISOString(),
    };
  }
}
