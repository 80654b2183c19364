export { UserLookupClient, GRPC_UNARY_TIMEOUT_MS } from './user-lookup.client';
export { UserLookupClientModule } from './user-lookup-client.module';
export type {
  UserLookupClientOptions,
  UserLookupClientAsyncOptions,
} from './user-lookup-client.module';
