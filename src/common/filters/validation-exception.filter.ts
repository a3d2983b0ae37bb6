// src/common/filters/validation-exception.filter.ts
import { ExceptionFilter, Catch, ArgumentsHost, BadRequestException, Logger } from '@nestjs/common';
import { ValidationError } from 'class-validator';
import { Request, Response } from 'express';

/** One "property: constraint" line per failed class-validator constraint. */
export const flattenValidationErrors = (errors: ValidationError[]): string[] =>
    errors.flatMap(error => [
        ...Object.values(error.constraints ?? {}).map(constraint => `${error.property}: ${constraint}`),
        ...flattenValidationErrors(error.children ?? []),
    ]);

/** Collect the class-validator messages a ValidationPipe puts in a BadRequestException. */
export const validationMessages = (exceptionResponse: string | object): string[] => {
    if (typeof exceptionResponse === 'string') return [exceptionResponse];
    const messages: unknown = Reflect.get(exceptionResponse, 'message');
    if (Array.isArray(messages)) {
        return messages.filter((message): message is string => typeof message === 'string');
    }
    return typeof messages === 'string' ? [messages] : [];
};

@Catch(BadRequestException)
export class ValidationExceptionFilter implements ExceptionFilter {
    private readonly logger = new Logger(ValidationExceptionFilter.name);

    catch(exception: BadRequestException, host: ArgumentsHost): void {
        const ctx = host.switchToHttp();
        const response = ctx.getResponse<Response>();
        const request = ctx.getRequest<Request>();
        const status = exception.getStatus();

        const details = validationMessages(exception.getResponse());

        this.logger.warn(`Validation Error: ${request.method} ${request.url} - ${details.join('; ')}`);

        response.status(status).json({
            success: false,
            statusCode: status,
            error: 'Validation Error',
            message: 'Request validation failed',
            details,
            timestamp: new Date().toISOString(),
            path: request.url,
            method: request.method,
        });
    }
}
