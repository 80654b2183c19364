import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import { RegisterDto } from './register.dto';

async function failingFields(body: Record<string, unknown>): Promise<string[]> {
  const errors = await validate(plainToInstance(RegisterDto, body), {
    whitelist: true,
    forbidNonWhitelisted: true,
  });
  return errors.map((error) => error.property).sort();
}

describe('RegisterDto', () => {
  const valid = {
    email: 'ada@example.com',
    password: 'correct-horse',
    passwordConfirm: 'correct-horse',
  };

  it('accepts the required fields alone', async () => {
    await expect(failingFields(valid)).resolves.toEqual([]);
  });

  it('accepts the optional profile fields', async () => {
    await expect(
      failingFields({ ...valid, username: 'ada', firstName: 'Ada', lastName: 'Lovelace', phoneNumber: '+44 20 0000' }),
    ).resolves.toEqual([]);
  });

  it('rejects a malformed email', async () => {
    await expect(failingFields({ ...valid, email: 'not-an-email' })).resolves.toEqual(['email']);
  });

  it('rejects passwords shorter than 8 characters', async () => {
    await expect(
      failingFields({ ...valid, password: 'short', passwordConfirm: 'short' }),
    ).resolves.toEqual(['password']);
  });

  it('requires the confirmation', async () => {
    await expect(failingFields({ email: valid.email, password: valid.password })).resolves.toEqual([
      'passwordConfirm',
    ]);
  });

  it('rejects fields it does not know', async () => {
    await expect(failingFields({ ...valid, isStaff: true })).resolves.toEqual(['isStaff']);
  });

  it('caps the phone number at 20 characters', async () => {
    await expect(failingFields({ ...valid, phoneNumber: '0'.repeat(21) })).resolves.toEqual([
      'phoneNumber',
    ]);
  });
});
