import { DynamicModule, FactoryProvider, Module, ModuleMetadata } from '@nestjs/common';
import { ClientsModule, GrpcOptions, Transport } from '@nestjs/microservices';
import {
  USER_SERVICE_GRPC_CLIENT,
  USER_PACKAGE_NAME,
  USER_PROTO_PATH,
} from '@user-service/proto';
import { UserLookupClient } from './user-lookup.client';

export interface UserLookupClientOptions {
  /** host:port of the user service gRPC listener */
  url: string;
}

export interface UserLookupClientAsyncOptions {
  imports?: ModuleMetadata['imports'];
  inject?: FactoryProvider<UserLookupClientOptions>['inject'];
  useFactory: FactoryProvider<UserLookupClientOptions>['useFactory'];
}

/**
 * Provides UserLookupClient to a consuming service.
 *
 * @example
 * ```ts
 * UserLookupClientModule.registerAsync({
 *   inject: [ConfigService],
 *   useFactory: (configService: ConfigService) => ({
 *     url: configService.get<string>('USER_SERVICE_GRPC_URL', 'localhost:50051'),
 *   }),
 * })
 * ```
 *
 * The connection is established lazily on the first call.
 */
@Module({})
export class UserLookupClientModule {
  static registerAsync(options: UserLookupClientAsyncOptions): DynamicModule {
    return {
      module: UserLookupClientModule,
      imports: [
        ClientsModule.registerAsync([
          {
            name: USER_SERVICE_GRPC_CLIENT,
            imports: options.imports,
            inject: options.inject,
            useFactory: async (...args: unknown[]): Promise<GrpcOptions> => {
              const { url } = await options.useFactory(...args);
              return {
                transport: Transport.GRPC,
                options: {
                  package: USER_PACKAGE_NAME,
                  protoPath: USER_PROTO_PATH,
                  url,
                },
              };
            },
          },
        ]),
      ],
      providers: [UserLookupClient],
      exports: [UserLookupClient],
    };
  }
}
