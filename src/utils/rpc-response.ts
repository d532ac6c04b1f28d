import { Metadata, status } from '@grpc/grpc-js';
import type { ServiceError, sendUnaryData } from '@grpc/grpc-js';
import type { FailureKind } from './errors';

/**
 * Result of one pipeline run, before it is put on the wire.
 */
export type Outcome<T> =
  | { kind: 'Success'; value: T }
  | { kind: FailureKind; message: string };

export const success = <T>(value: T): Outcome<T> => ({ kind: 'Success', value });

export const failure = <T>(kind: FailureKind, message: string): Outcome<T> => ({ kind, message });

export const STATUS_BY_KIND: Record<FailureKind, status> = {
  InvalidInput: status.INVALID_ARGUMENT,
  NotFound: status.NOT_FOUND,
  Conflict: status.ALREADY_EXISTS,
  InternalFailure: status.INTERNAL,
};

/**
 * Minimal view of a server-streaming call; grpc-js `ServerWritableStream` satisfies it.
 */
export interface StreamCall<Req, Res> {
  readonly request: Req;
  readonly cancelled: boolean;
  write(chunk: Res): boolean;
  end(): void;
  emit(event: 'error', error: ServiceError): boolean;
  on(event: 'cancelled', listener: () => void): this;
  once(event: 'drain' | 'cancelled', listener: () => void): this;
  off(event: 'drain' | 'cancelled', listener: () => void): this;
}

/**
 * Response Handler for gRPC calls - maps outcomes onto status codes
 */
export class RpcResponder {
  static toServiceError(kind: FailureKind, message: string): ServiceError {
    return Object.assign(new Error(message), {
      code: STATUS_BY_KIND[kind],
      details: message,
      metadata: new Metadata(),
    });
  }

  /**
   * Unary reply: value on success, status error otherwise
   */
  static reply<T>(callback: sendUnaryData<T>, outcome: Outcome<T>): void {
    if (outcome.kind === 'Success') {
      callback(null, outcome.value);
      return;
    }

    callback(this.toServiceError(outcome.kind, outcome.message));
  }

  /**
   * Close a server stream; records were already written by the pipeline
   */
  static finish<Req, Res, T>(call: StreamCall<Req, Res>, outcome: Outcome<T>): void {
    if (outcome.kind === 'Success') {
      call.end();
      return;
    }

    call.emit('error', this.toServiceError(outcome.kind, outcome.message));
  }
}
