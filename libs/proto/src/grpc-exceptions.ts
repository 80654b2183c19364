/**
 * Custom gRPC exception classes.
 *
 * These wrap RpcException with gRPC status codes so that the lookup
 * server and its clients share the same error contract. The message
 * travels as the status details string.
 *
 * @see https://grpc.github.io/grpc/core/md_doc_statuscodes.html
 */
import { RpcException } from '@nestjs/microservices';
import { status as GrpcStatus } from '@grpc/grpc-js';

export class GrpcNotFoundException extends RpcException {
  constructor(message: string) {
    super({
      code: GrpcStatus.NOT_FOUND,
      message,
    });
  }
}

export class GrpcInternalException extends RpcException {
  constructor(message: string) {
    super({
      code: GrpcStatus.INTERNAL,
      message,
    });
  }
}

/**
 * Reads the numeric gRPC status off an error surfaced by a ClientGrpc call.
 * grpc-js attaches it as `code`; anything else yields undefined.
 */
export function grpcStatusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'number' ? code : undefined;
  }
  return undefined;
}
