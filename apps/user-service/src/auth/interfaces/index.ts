export type { RequestUser } from './authenticated-request.interface';
