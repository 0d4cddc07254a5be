/**
 * Error Handler Unit Tests
 *
 * ApiError factories and the JSON envelope written by errorHandler.
 */

import express, { NextFunction, Request, Response } from 'express';
import { body } from 'express-validator';
import request from 'supertest';

import { ApiError, errorHandler, notFoundHandler } from '../../../src/middlewares/errorHandler';
import { validateRequest } from '../../../src/middlewares/validateRequest';
import { ErrorCode } from '../../../src/types/errors';

const appThrowing = (error: Error) => {
  const app = express();
  app.get('/boom', (_req: Request, _res: Response, next: NextFunction) => next(error));
  app.use(notFoundHandler);
  app.use(errorHandler);
  return app;
};

describe('ApiError', () => {
  it('should map resources to their not-found codes', () => {
    expect(ApiError.notFound('Wallet').errorCode).toBe(ErrorCode.WALLET_NOT_FOUND);
    expect(ApiError.notFound('Webhook log').errorCode).toBe(ErrorCode.WEBHOOK_LOG_NOT_FOUND);
    expect(ApiError.notFound('Refund').errorCode).toBe(ErrorCode.RESOURCE_NOT_FOUND);
    expect(ApiError.notFound('Charge').statusCode).toBe(404);
  });

  it('should derive the status from the error code', () => {
    expect(ApiError.alreadyExists('Wallet').statusCode).toBe(409);
    expect(ApiError.queue().statusCode).toBe(503);
    expect(ApiError.amountMismatch('off by 2 cents').statusCode).toBe(400);
  });

  it('should mark internal errors as non-operational', () => {
    expect(ApiError.internal().isOperational).toBe(false);
    expect(ApiError.invalidAmount().isOperational).toBe(true);
  });
});

describe('errorHandler', () => {
  it('should write the error envelope for an ApiError', async () => {
    const response = await request(appThrowing(ApiError.notFound('Charge'))).get('/boom');

    expect(response.status).toBe(404);
    expect(response.body).toMatchObject({
      success: false,
      error: { code: ErrorCode.CHARGE_NOT_FOUND, message: 'Charge not found' },
    });
    expect(response.body.error.timestamp).toEqual(expect.any(String));
  });

  it('should treat an unknown error as internal', async () => {
    const response = await request(appThrowing(new Error('socket hang up'))).get('/boom');

    expect(response.status).toBe(500);
    expect(response.body.error.code).toBe(ErrorCode.INTERNAL_ERROR);
    expect(response.body.error.message).toBe('socket hang up');
  });
});

describe('validateRequest', () => {
  const app = express();
  app.use(express.json());
  app.post(
    '/things',
    body('name').notEmpty().withMessage('Name is required'),
    body('size').isInt().withMessage('Size must be an integer'),
    validateRequest,
    (_req: Request, res: Response) => {
      res.status(201).json({ success: true });
    }
  );
  app.use(errorHandler);

  it('should group messages by field', async () => {
    const response = await request(app).post('/things').send({ size: 'large' });

    expect(response.status).toBe(400);
    expect(response.body.error.code).toBe(ErrorCode.VALIDATION_ERROR);
    expect(response.body.error.details).toEqual({
      name: ['Name is required'],
      size: ['Size must be an integer'],
    });
  });

  it('should pass a valid body through', async () => {
    const response = await request(app).post('/things').send({ name: 'box', size: 3 });

    expect(response.status).toBe(201);
  });
});
