import {
  Body,
  Controller,
  DefaultValuePipe,
  Get,
  ParseBoolPipe,
  ParseIntPipe,
  Post,
  Query,
  Res,
} from '@nestjs/common';
import { Response } from 'express';
import { ZodValidationPipe } from '../common/zod-validation.pipe';
import { RiskAssessmentService } from '../risk-assessment/risk-assessment.service';
import { AnswerValidatorService } from '../risk-assessment/services/answer-validator.service';
import { JournalService } from './journal.service';
import { CreateJournalEntryRequest, createJournalEntrySchema } from './dto/journal-entry.dto';

@Controller('journal')
export class JournalController {
  constructor(
    private journalService: JournalService,
    private riskAssessmentService: RiskAssessmentService,
    private answerValidator: AnswerValidatorService,
  ) {}

  /**
   * Save a session. The decision is recomputed from the submitted answers
   * rather than taken from the client.
   */
  @Post()
  addEntry(@Body(new ZodValidationPipe(createJournalEntrySchema)) body: CreateJournalEntryRequest) {
    this.answerValidator.validate(body.answers);
    const decision = this.riskAssessmentService.evaluate(body.answers, body.stats, body.tradeDetails);

    const entry = this.journalService.addEntry({
      answers: body.answers,
      stats: body.stats,
      decision,
      tradeDetails: body.tradeDetails,
      notes: body.notes,
    });

    return {
      success: true,
      data: entry,
      timestamp: new Date().toISOString(),
    };
  }

  @Get()
  getEntries(
    @Query('limit', new DefaultValuePipe(20), ParseIntPipe) limit: number,
    @Query('tradedOnly', new DefaultValuePipe(false), ParseBoolPipe) tradedOnly: boolean,
  ) {
    return {
      success: true,
      data: this.journalService.getEntries({ limit, tradedOnly }),
      timestamp: new Date().toISOString(),
    };
  }

  @Get('stats')
  getStats(@Query('days', new DefaultValuePipe(7), ParseIntPipe) days: number) {
    return {
      success: true,
      data: this.journalService.getStats(days),
      timestamp: new Date().toISOString(),
    };
  }

  @Get('export')
  exportCsv(@Res() res: Response) {
    res.setHeader('Content-Type', 'text/csv');
    res.setHeader('Content-Disposition', 'attachment; filename="journal.csv"');
    res.send(this.journalService.toCsv());
  }
}
