import { BadRequestException } from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import Decimal from 'decimal.js';
import { HttpExceptionFilter } from './http-exception.filter';
import { InsufficientBalanceException, PersistenceException } from '../errors/billing.errors';

class RecordedReply {
  statusCode = 0;
  body: unknown = null;

  status(code: number): this {
    this.statusCode = code;
    return this;
  }

  send(body: unknown): this {
    this.body = body;
    return this;
  }
}

describe('HttpExceptionFilter', () => {
  const filter = new HttpExceptionFilter();

  const render = (exception: unknown): RecordedReply => {
    const reply = new RecordedReply();
    filter.catch(exception, new ExecutionContextHost([{}, reply]));
    return reply;
  };

  it('renders business errors with their code and details', () => {
    const reply = render(new InsufficientBalanceException(new Decimal(25), new Decimal(10)));

    expect(reply.statusCode).toBe(402);
    expect(reply.body).toEqual({
      data: null,
      error: {
        code: 'INSUFFICIENT_BALANCE',
        message: 'Insufficient credit balance: requested 25.00, available 10.00',
        details: { requested: '25.00', available: '10.00', shortfall: '15.00' },
      },
    });
  });

  it('joins validation messages', () => {
    const reply = render(
      new BadRequestException({
        statusCode: 400,
        message: ['amount must be a decimal number', 'feature_name should not be empty'],
        error: 'Bad Request',
      }),
    );

    expect(reply.statusCode).toBe(400);
    expect(reply.body).toEqual({
      data: null,
      error: {
        code: 'INVALID_INPUT',
        message: 'amount must be a decimal number; feature_name should not be empty',
      },
    });
  });

  it('maps storage failures to 503', () => {
    const reply = render(new PersistenceException('save webhook event', { message: 'connection terminated', code: '08006' }));

    expect(reply.statusCode).toBe(503);
    expect(reply.body).toEqual({
      data: null,
      error: {
        code: 'PERSISTENCE_ERROR',
        message: 'Failed to save webhook event: connection terminated',
        details: { db_code: '08006' },
      },
    });
  });

  it('hides unexpected errors', () => {
    const reply = render(new Error('secret internals'));

    expect(reply.statusCode).toBe(500);
    expect(reply.body).toEqual({ data: null, error: { code: 'INTERNAL_ERROR', message: 'Internal server error' } });
  });
});
