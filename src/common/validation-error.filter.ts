import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import { Response } from 'express';
import { ValidationError } from './errors';

@Catch(ValidationError)
export class ValidationErrorFilter implements ExceptionFilter<ValidationError> {
  private readonly logger = new Logger(ValidationErrorFilter.name);

  catch(error: ValidationError, host: ArgumentsHost) {
    const response = host.switchToHttp().getResponse<Response>();
    this.logger.warn(`Rejected input: ${error.message} ${error.issues.join('; ')}`);

    response.status(HttpStatus.BAD_REQUEST).json({
      success: false,
      message: error.message,
      issues: error.issues,
      timestamp: new Date().toISOString(),
    });
  }
}
