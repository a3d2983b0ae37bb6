// src/common/filters/global-exception.filter.ts
import { ExceptionFilter, Catch, ArgumentsHost, HttpException, HttpStatus, Logger } from '@nestjs/common';
import { Request, Response } from 'express';
import { ConfigService } from '@nestjs/config';
import { isReservationServiceError } from '../../modules/booking/errors/reservation.errors';

const readField = (body: object, field: 'message' | 'error'): unknown =>
    field in body ? Reflect.get(body, field) : undefined;

@Catch()
export class GlobalExceptionFilter implements ExceptionFilter {
    private readonly logger = new Logger(GlobalExceptionFilter.name);

    constructor(private readonly configService: ConfigService) {}

    catch(exception: unknown, host: ArgumentsHost): void {
        const ctx = host.switchToHttp();
        const response = ctx.getResponse<Response>();
        const request = ctx.getRequest<Request>();

        const isProduction = this.configService.get<string>('NODE_ENV') === 'production';

        let status: number;
        let message: unknown;
        let error: string;

        if (exception instanceof HttpException) {
            status = exception.getStatus();
            const exceptionResponse = exception.getResponse();

            if (typeof exceptionResponse === 'string') {
                message = exceptionResponse;
                error = exception.name;
            } else {
                message = readField(exceptionResponse, 'message') ?? exceptionResponse;
                const named = readField(exceptionResponse, 'error');
                error = typeof named === 'string' ? named : exception.name;
            }
        } else if (isReservationServiceError(exception)) {
            // a remote reservation service failed outside a saga
            status = HttpStatus.BAD_GATEWAY;
            message = exception.message;
            error = exception.kind;
        } else if (exception instanceof Error) {
            status = HttpStatus.INTERNAL_SERVER_ERROR;
            message = isProduction ? 'Internal server error' : exception.message;
            error = exception.name || 'InternalServerError';
        } else {
            status = HttpStatus.INTERNAL_SERVER_ERROR;
            message = 'Unknown error occurred';
            error = 'UnknownError';
        }

        const errorLog = {
            path: request.url,
            method: request.method,
            status,
            error,
            message,
            ...(exception instanceof Error && !isProduction && { stack: exception.stack }),
        };

        if (status >= 500) {
            this.logger.error('Internal Server Error', JSON.stringify(errorLog, null, 2));
        } else if (status >= 400) {
            this.logger.warn(`Client Error ${JSON.stringify(errorLog)}`);
        }

        response.status(status).json({
            success: false,
            statusCode: status,
            error,
            message,
            timestamp: new Date().toISOString(),
            path: request.url,
            method: request.method,
        });
    }
}
