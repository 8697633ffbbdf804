export type ApiSuccess<T> = {
  readonly kind: 'SUCCESS';
  readonly data: T;
};

export type ApiFailure = {
  readonly kind: 'ERROR';
  readonly message: string;
  readonly statusCode: number | null;
};

export type ApiResult<T> = ApiSuccess<T> | ApiFailure;

export function success<T>(data: T): ApiSuccess<T> {
  return { kind: 'SUCCESS', data };
}

export function failure(message: string, statusCode: number | null = null): ApiFailure {
  return { kind: 'ERROR', message, statusCode };
}
