import {
  AppError,
  ErrorCode,
  ExternalServiceError,
  NotADogError,
  classifyFailure,
  toAppError,
} from './error-handling';

describe('AppError', () => {
  it('uses the user message for its code', () => {
    const error = new AppError(ErrorCode.SCAN_NOT_FOUND);

    expect(error.message).toBe('We couldn\'t find that scan.');
    expect(error.getUserMessage().title).toBe('Scan not found');
    expect(error.getStatusCode()).toBe(404);
    expect(error.isRetryable()).toBe(false);
  });

  it('serializes for API responses', () => {
    const json = new NotADogError().toJSON();

    expect(json.code).toBe('NOT_A_DOG');
    expect(json.title).toBe('No dog detected');
    expect(json.statusCode).toBe(422);
  });
});

describe('ExternalServiceError', () => {
  it('maps identifier failures to their own codes', () => {
    expect(new ExternalServiceError('identifier', 'quota').code).toBe(ErrorCode.IDENTIFIER_QUOTA);
    expect(new ExternalServiceError('identifier', 'network').code).toBe(ErrorCode.IDENTIFIER_UNAVAILABLE);
    expect(new ExternalServiceError('classifier', 'timeout').code).toBe(ErrorCode.CLASSIFIER_UNAVAILABLE);
  });

  it('never retries blocked content', () => {
    expect(new ExternalServiceError('identifier', 'blocked').isRetryable()).toBe(false);
    expect(new ExternalServiceError('identifier', 'timeout').isRetryable()).toBe(true);
  });
});

describe('classifyFailure', () => {
  it('reads the HTTP status first', () => {
    expect(classifyFailure(Object.assign(new Error('nope'), { status: 429 }))).toBe('quota');
    expect(classifyFailure(Object.assign(new Error('nope'), { status: 504 }))).toBe('timeout');
  });

  it('falls back to the message', () => {
    expect(classifyFailure(new Error('Request blocked by safety settings'))).toBe('blocked');
    expect(classifyFailure(new TypeError('fetch failed'))).toBe('network');
    expect(classifyFailure('something else')).toBe('unavailable');
  });
});

describe('toAppError', () => {
  it('passes AppErrors through', () => {
    const error = new AppError(ErrorCode.FORBIDDEN);
    expect(toAppError(error)).toBe(error);
  });

  it('maps body-parser failures', () => {
    expect(toAppError(Object.assign(new Error('too big'), { type: 'entity.too.large' })).code).toBe(ErrorCode.IMAGE_TOO_LARGE);
    expect(toAppError(Object.assign(new Error('bad json'), { type: 'entity.parse.failed' })).code).toBe(ErrorCode.INVALID_INPUT);
  });

  it('wraps anything else as internal', () => {
    const error = toAppError('boom');
    expect(error.code).toBe(ErrorCode.INTERNAL_ERROR);
    expect(error.originalError?.message).toBe('boom');
  });
});
