import { ConstructionError, NoResultsFailure } from '@yieldcast/engine';

export type ErrorStatus = 400 | 401 | 404 | 409 | 422 | 500;

export class AppError extends Error {
  constructor(
    public code: string,
    message: string,
    public status: ErrorStatus = 400,
    public suggestion = '',
  ) {
    super(message);
  }
}

export const notFound = (entity: string, id: string) =>
  new AppError(
    'NOT_FOUND',
    `${entity} '${id}' not found`,
    404,
    `Use GET /api/v1/${entity.toLowerCase()}s to list available IDs`,
  );

export const validationError = (message: string) =>
  new AppError('VALIDATION_ERROR', message, 400, 'Check request body');

export const calculationFailed = (message: string) =>
  new AppError('CALCULATION_FAILED', message, 422, 'Check the fund definition in the catalog');

/** Maps engine and runtime errors onto the API's error envelope. */
export function toAppError(err: Error): AppError {
  if (err instanceof AppError) return err;
  if (err instanceof ConstructionError) return validationError(err.message);
  if (err instanceof NoResultsFailure) {
    return new AppError('NO_RESULTS', err.message, 422, 'Raise the initial capital or choose other funds');
  }
  if (err instanceof SyntaxError) return validationError('Request body must be valid JSON');
  return new AppError('INTERNAL_ERROR', err.message, 500, 'Check server logs');
}
