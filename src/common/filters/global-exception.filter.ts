import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { PlotDataValidationError } from '../../plot-data/plot-data.errors';

@Catch()
export class GlobalExceptionFilter implements ExceptionFilter {
  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const isNoiseRequest = request.url.includes('/.well-known/') ||
                          request.url.includes('/favicon.ico');

    let httpStatus: number = HttpStatus.INTERNAL_SERVER_ERROR;
    let message: string | object = 'Internal server error';
    if (exception instanceof HttpException) {
      httpStatus = exception.getStatus();
      message = exception.getResponse();
    } else if (exception instanceof PlotDataValidationError) {
      // Malformed digitizations are the caller's fault
      httpStatus = HttpStatus.BAD_REQUEST;
      message = { message: exception.message, issues: exception.issues };
    }

    if (!isNoiseRequest) {
      console.error('=== ERROR CAUGHT BY GLOBAL FILTER ===');
      console.error(`Timestamp: ${new Date().toISOString()}`);
      console.error(`Method: ${request.method}`);
      console.error(`URL: ${request.url}`);
      console.error(`Status: ${httpStatus}`);
      console.error(`Message: ${JSON.stringify(message)}`);

      if (exception instanceof Error) {
        console.error(`Error Name: ${exception.name}`);
        console.error(`Error Message: ${exception.message}`);
        if (httpStatus >= 500) {
          console.error(`Stack Trace:`);
          console.error(exception.stack);
        }
      } else {
        console.error(`Raw Exception:`, exception);
      }
      console.error('=========================');
    }

    if (!response.headersSent) {
      response.status(httpStatus).json({
        statusCode: httpStatus,
        timestamp: new Date().toISOString(),
        path: request.url,
        message: typeof message === 'string' ? message : JSON.stringify(message),
      });
    }
  }
}
