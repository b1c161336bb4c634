import { ArgumentsHost, BadRequestException, NotFoundException } from '@nestjs/common';
import { AllExceptionsFilter, HttpExceptionFilter } from './http-exception.filter';
import { RunStateError, StoreUnavailableError } from '../../qualification/errors/qualification.errors';

describe('exception filters', () => {
  const json = jest.fn();
  const status = jest.fn(() => ({ json }));

  const host = {
    switchToHttp: () => ({
      getRequest: () => ({ url: '/qualification/runs/123' }),
      getResponse: () => ({ status }),
    }),
  } as unknown as ArgumentsHost;

  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('should answer an HttpException with its status and message', () => {
    new HttpExceptionFilter().catch(new NotFoundException('Run 123 not found'), host);

    expect(status).toHaveBeenCalledWith(404);
    expect(json).toHaveBeenCalledWith({
      statusCode: 404,
      message: 'Run 123 not found',
      path: '/qualification/runs/123',
      timestamp: expect.any(String),
    });
  });

  it('should keep the list of validation messages', () => {
    new HttpExceptionFilter().catch(
      new BadRequestException(['rows must be an array', 'force must be a boolean value']),
      host,
    );

    expect(json).toHaveBeenCalledWith(
      expect.objectContaining({
        statusCode: 400,
        message: ['rows must be an array', 'force must be a boolean value'],
      }),
    );
  });

  it('should answer a store outage with 503', () => {
    new AllExceptionsFilter().catch(
      new StoreUnavailableError('Historical lookup unavailable: connection refused'),
      host,
    );

    expect(status).toHaveBeenCalledWith(503);
    expect(json).toHaveBeenCalledWith(
      expect.objectContaining({ message: 'Historical lookup unavailable: connection refused' }),
    );
  });

  it('should answer an illegal run transition with 409', () => {
    new AllExceptionsFilter().catch(new RunStateError('run-1', 'success', 'complete'), host);

    expect(status).toHaveBeenCalledWith(409);
  });

  it('should hide the details of unexpected errors', () => {
    new AllExceptionsFilter().catch(new TypeError('cannot read properties of undefined'), host);

    expect(status).toHaveBeenCalledWith(500);
    expect(json).toHaveBeenCalledWith(
      expect.objectContaining({ statusCode: 500, message: 'Internal server error' }),
    );
  });
});
