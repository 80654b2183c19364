import { loadSync } from '@grpc/proto-loader';
import type { AnyDefinition, ServiceDefinition } from '@grpc/proto-loader';
import { USER_PROTO_PATH, USER_PACKAGE_NAME, USER_SERVICE_NAME } from './index';

function isService(definition: AnyDefinition | undefined): definition is ServiceDefinition {
  return definition !== undefined && !('format' in definition);
}

describe('user.proto', () => {
  const packageDefinition = loadSync(USER_PROTO_PATH, { keepCase: false, defaults: true });

  it('declares the four lookup methods as unary calls', () => {
    const service = packageDefinition[`${USER_PACKAGE_NAME}.${USER_SERVICE_NAME}`];
    if (!isService(service)) {
      throw new Error('user.UserService is missing');
    }

    expect(Object.keys(service).sort()).toEqual([
      'GetUser',
      'GetUserByEmail',
      'ListUsers',
      'ValidateToken',
    ]);
    expect(service['GetUserByEmail']?.path).toBe('/user.UserService/GetUserByEmail');
    for (const method of Object.values(service)) {
      expect(method.requestStream).toBe(false);
      expect(method.responseStream).toBe(false);
    }
  });

  it.each(['UserRequest', 'EmailRequest', 'TokenRequest', 'ListUsersRequest', 'UserData'])(
    'declares the %s message',
    (message) => {
      const definition = packageDefinition[`${USER_PACKAGE_NAME}.${message}`];

      expect(definition).toBeDefined();
      expect(isService(definition)).toBe(false);
    },
  );
});
