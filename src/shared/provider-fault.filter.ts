import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import type { Response } from 'express';
import { ProviderFaultError } from '../provider/provider-fault.error';

@Catch(ProviderFaultError)
export class ProviderFaultFilter implements ExceptionFilter {
  private readonly logger = new Logger(ProviderFaultFilter.name);

  catch(exception: ProviderFaultError, host: ArgumentsHost): void {
    this.logger.error(`${exception.message} (status ${exception.status ?? 'n/a'})`);
    const response = host.switchToHttp().getResponse<Response>();
    response.status(HttpStatus.BAD_GATEWAY).json({
      statusCode: HttpStatus.BAD_GATEWAY,
      error: 'Bad Gateway',
      message: exception.message,
    });
  }
}
