import type { TreeError } from './errors.js';

/** Three-variant discriminated union returned by every mutation */
export type MutationResult<T> =
  | { readonly type: 'success'; readonly data: T; readonly message: string }
  | { readonly type: 'no-change'; readonly message: string }
  | { readonly type: 'error'; readonly error: TreeError };

export function success<T>(data: T, message: string): MutationResult<T> {
  return { type: 'success', data, message };
}

export function noChange<T>(message: string): MutationResult<T> {
  return { type: 'no-change', message };
}

export function failure<T>(error: TreeError): MutationResult<T> {
  return { type: 'error', error };
}

// Helper functions
export function isSuccess<T>(r: MutationResult<T>): r is { readonly type: 'success'; readonly data: T; readonly message: string } {
  return r.type === 'success';
}

export function isError<T>(r: MutationResult<T>): r is { readonly type: 'error'; readonly error: TreeError } {
  return r.type === 'error';
}

/** One-line description of any result, for logs and terminal output */
export function describeResult<T>(r: MutationResult<T>): string {
  switch (r.type) {
    case 'success': return r.message;
    case 'no-change': return r.message;
    case 'error': return `${r.error.kind}: ${r.error.message}`;
  }
}
