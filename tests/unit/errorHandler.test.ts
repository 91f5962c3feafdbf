import { classifyError } from '@/middleware/errorHandler';
import { AppError } from '@/utils/errors';

describe('Error Handler', () => {
  describe('classifyError', () => {
    test('should keep the code of an AppError', () => {
      expect(classifyError(new AppError('NOT_FOUND', 'No sensor readings stored yet'))).toEqual({
        code: 'NOT_FOUND',
        statusCode: 404,
      });
      expect(classifyError(new AppError('AI_SERVICE_ERROR', 'upstream down'))).toEqual({
        code: 'AI_SERVICE_ERROR',
        statusCode: 500,
      });
    });

    test('should treat body-parser failures as validation errors', () => {
      const parseError = Object.assign(new SyntaxError('Unexpected end of JSON input'), {
        type: 'entity.parse.failed',
        status: 400,
      });

      expect(classifyError(parseError)).toEqual({ code: 'VALIDATION_ERROR', statusCode: 500 });
    });

    test('should treat driver errors as database errors', () => {
      const driverError = new Error('Server selection timed out after 30000 ms');
      driverError.name = 'MongooseServerSelectionError';
      const networkError = new Error('connection refused');
      networkError.name = 'MongoNetworkError';

      expect(classifyError(networkError)).toEqual({ code: 'DATABASE_ERROR', statusCode: 500 });
      expect(classifyError(driverError)).toEqual({ code: 'DATABASE_ERROR', statusCode: 500 });
    });

    test('should only read string-valued type and name fields', () => {
      const driverError = Object.assign(new Error('connection reset'), { type: 400, name: 'MongoNetworkError' });
      const numericName = { name: 42, type: ['entity.parse.failed'] };

      expect(classifyError(driverError)).toEqual({ code: 'DATABASE_ERROR', statusCode: 500 });
      expect(classifyError(numericName)).toEqual({ code: 'SERVER_ERROR', statusCode: 500 });
    });

        test('should fall back to SERVER_ERROR', () => {
      expect(classifyError(new Error('boom'))).toEqual({ code: 'SERVER_ERROR', statusCode: 500 });
      expect(classifyError('boom')).toEqual({ code: 'SERVER_ERROR', statusCode: 500 });
    });
  });
});
