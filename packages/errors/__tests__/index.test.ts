/**
 * Error Handling Package Tests
 *
 * AppError hierarchy, database error sanitization and the response helpers.
 */

import { describe, it, expect, afterEach } from 'vitest';
import Fastify from 'fastify';

import {
  AppError,
  DatabaseError,
  ErrorCodes,
  NotFoundError,
  ValidationError,
  getErrorMessage,
  toError,
} from '../index';
import { errors, sendAppError } from '../responses';

describe('Error Handling Package', () => {
  const originalNodeEnv = process.env['NODE_ENV'];

  afterEach(() => {
    process.env['NODE_ENV'] = originalNodeEnv;
  });

  describe('AppError', () => {
    it('defaults to a 500 internal error', () => {
      const error = new AppError('boom');

      expect(error.statusCode).toBe(500);
      expect(error.code).toBe('INTERNAL_ERROR');
      expect(error.name).toBe('AppError');
      expect(error).toBeInstanceOf(Error);
    });

    it('keeps the cause', () => {
      const cause = new Error('root');
      const error = new AppError('wrapped', ErrorCodes.DATABASE_ERROR, 500, undefined, undefined, { cause });

      expect(error.cause).toBe(cause);
    });

    it('serializes only the fields that are set', () => {
      expect(new AppError('boom').toJSON()).toEqual({ error: 'boom', code: 'INTERNAL_ERROR' });
      expect(new ValidationError('bad', { field: 'uf' }, 'req-1').toJSON()).toEqual({
        error: 'bad',
        code: 'VALIDATION_ERROR',
        details: { field: 'uf' },
        requestId: 'req-1',
      });
    });
  });

  describe('subclasses', () => {
    it('maps ValidationError to 400', () => {
      const error = new ValidationError();

      expect(error.statusCode).toBe(400);
      expect(error.message).toBe('Validation failed');
      expect(error.name).toBe('ValidationError');
    });

    it('names the missing resource', () => {
      const error = new NotFoundError('Licitacao');

      expect(error.message).toBe('Licitacao not found');
      expect(error.statusCode).toBe(404);
      expect(error.code).toBe('NOT_FOUND');
    });
  });

  describe('DatabaseError.fromDBError', () => {
    it('classifies connection failures', () => {
      const error = DatabaseError.fromDBError(new Error('connect ECONNREFUSED 127.0.0.1:5432'));

      expect(error.code).toBe('CONNECTION_ERROR');
      expect(error.message).toBe('Database connection error. Please try again later.');
    });

    it('classifies timeouts', () => {
      const error = DatabaseError.fromDBError(new Error('Query read timeout'));

      expect(error.code).toBe('QUERY_TIMEOUT');
    });

    it('hides the driver message outside development', () => {
      process.env['NODE_ENV'] = 'production';
      const cause = new Error('relation "licitacoes" does not exist');

      const error = DatabaseError.fromDBError(cause);

      expect(error.message).toBe('An unexpected database error occurred');
      expect(error.details).toEqual({ originalError: undefined });
      expect(error.cause).toBe(cause);
    });

    it('exposes the driver message in development', () => {
      process.env['NODE_ENV'] = 'development';

      const error = DatabaseError.fromDBError(new Error('syntax error at or near "SELEC"'));

      expect(error.details).toEqual({ originalError: 'syntax error at or near "SELEC"' });
    });
  });

  describe('helpers', () => {
    it('extracts messages from anything thrown', () => {
      expect(getErrorMessage(new Error('boom'))).toBe('boom');
      expect(getErrorMessage('plain')).toBe('plain');
      expect(getErrorMessage(42)).toBe('42');
    });

    it('wraps non-errors', () => {
      const original = new Error('boom');

      expect(toError(original)).toBe(original);
      expect(toError('plain').message).toBe('plain');
    });
  });

  describe('response helpers', () => {
    async function build() {
      const app = Fastify({ logger: false });
      app.get('/missing', async (_req, reply) => errors.notFound(reply, 'Licitacao'));
      app.get('/invalid', async (_req, reply) => errors.validationFailed(reply, [{ path: ['uf'] }]));
      app.get('/app-error', async (_req, reply) => sendAppError(reply, new ValidationError('uf is required', { field: 'uf' })));
      await app.ready();
      return app;
    }

    it('echoes X-Request-ID', async () => {
      const app = await build();

      const res = await app.inject({ method: 'GET', url: '/missing', headers: { 'x-request-id': 'req-42' } });

      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({ error: 'Licitacao not found', code: 'NOT_FOUND', requestId: 'req-42' });
      await app.close();
    });

    it('omits details outside development', async () => {
      process.env['NODE_ENV'] = 'production';
      const app = await build();

      const res = await app.inject({ method: 'GET', url: '/invalid', headers: { 'x-request-id': 'req-1' } });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({ error: 'Validation failed', code: 'VALIDATION_ERROR', requestId: 'req-1' });
      await app.close();
    });

    it('includes details in development', async () => {
      process.env['NODE_ENV'] = 'development';
      const app = await build();

      const res = await app.inject({ method: 'GET', url: '/app-error', headers: { 'x-request-id': 'req-1' } });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        error: 'uf is required',
        code: 'VALIDATION_ERROR',
        requestId: 'req-1',
        details: { field: 'uf' },
      });
      await app.close();
    });
  });
});
