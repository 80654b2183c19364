import { Test } from '@nestjs/testing';
import { buildUser } from '../testing/user.fixture';
import { UsersRepository } from './users.repository';
import { PasswordHasher } from './password-hasher.service';
import { UsersService } from './users.service';

describe('UsersService', () => {
  let usersService: UsersService;
  const user = buildUser();

  const usersRepository = {
    findById: jest.fn(),
    isUsernameTaken: jest.fn(),
    updateProfile: jest.fn(),
    updatePasswordHash: jest.fn(),
    deactivate: jest.fn(),
    listActive: jest.fn(),
    countActive: jest.fn(),
  };
  const passwordHasher = {
    hash: jest.fn(),
    verify: jest.fn(),
  };

  beforeEach(async () => {
    jest.resetAllMocks();

    const moduleRef = await Test.createTestingModule({
      providers: [
        UsersService,
        { provide: UsersRepository, useValue: usersRepository },
        { provide: PasswordHasher, useValue: passwordHasher },
      ],
    }).compile();

    usersService = moduleRef.get(UsersService);
  });

  describe('updateProfile', () => {
    it('writes only the supplied fields, trimmed', async () => {
      const updated = buildUser({ firstName: 'Augusta' });
      usersRepository.isUsernameTaken.mockResolvedValue(false);
      usersRepository.findById.mockResolvedValue(updated);

      const result = await usersService.updateProfile(user.id, {
        firstName: ' Augusta ',
        username: 'ada',
      });

      expect(usersRepository.isUsernameTaken).toHaveBeenCalledWith('ada', user.id);
      expect(usersRepository.updateProfile).toHaveBeenCalledWith(user.id, {
        username: 'ada',
        firstName: 'Augusta',
      });
      expect(result).toEqual({ ok: true, value: updated });
    });

    it('rejects a username held by another user', async () => {
      usersRepository.isUsernameTaken.mockResolvedValue(true);

      const result = await usersService.updateProfile(user.id, { username: 'grace' });

      expect(result).toEqual({ ok: false, error: 'USERNAME_TAKEN' });
      expect(usersRepository.updateProfile).not.toHaveBeenCalled();
    });

    it('skips the write for an empty body', async () => {
      usersRepository.findById.mockResolvedValue(user);

      const result = await usersService.updateProfile(user.id, {});

      expect(usersRepository.updateProfile).not.toHaveBeenCalled();
      expect(result).toEqual({ ok: true, value: user });
    });

    it('allows clearing the username without a uniqueness check', async () => {
      usersRepository.findById.mockResolvedValue(user);

      await usersService.updateProfile(user.id, { username: '' });

      expect(usersRepository.isUsernameTaken).not.toHaveBeenCalled();
      expect(usersRepository.updateProfile).toHaveBeenCalledWith(user.id, { username: '' });
    });
  });

  describe('changePassword', () => {
    const dto = {
      oldPassword: 'correct-horse',
      newPassword: 'battery-staple',
      newPasswordConfirm: 'battery-staple',
    };

    it('stores the hash of the new password', async () => {
      usersRepository.findById.mockResolvedValue(user);
      passwordHasher.verify.mockResolvedValue(true);
      passwordHasher.hash.mockResolvedValue('next-hash');

      const result = await usersService.changePassword(user.id, dto);

      expect(passwordHasher.verify).toHaveBeenCalledWith('correct-horse', 'stored-hash');
      expect(usersRepository.updatePasswordHash).toHaveBeenCalledWith(user.id, 'next-hash');
      expect(result).toEqual({ ok: true, value: undefined });
    });

    it('rejects a wrong old password before looking at the new one', async () => {
      usersRepository.findById.mockResolvedValue(user);
      passwordHasher.verify.mockResolvedValue(false);

      const result = await usersService.changePassword(user.id, {
        ...dto,
        newPasswordConfirm: 'something-else',
      });

      expect(result).toEqual({ ok: false, error: 'OLD_PASSWORD_INCORRECT' });
      expect(usersRepository.updatePasswordHash).not.toHaveBeenCalled();
    });

    it('rejects mismatched new passwords', async () => {
      usersRepository.findById.mockResolvedValue(user);
      passwordHasher.verify.mockResolvedValue(true);

      const result = await usersService.changePassword(user.id, {
        ...dto,
        newPasswordConfirm: 'battery-stapler',
      });

      expect(result).toEqual({ ok: false, error: 'PASSWORD_MISMATCH' });
    });

    it('rejects an entirely numeric new password', async () => {
      usersRepository.findById.mockResolvedValue(user);
      passwordHasher.verify.mockResolvedValue(true);

      const result = await usersService.changePassword(user.id, {
        ...dto,
        newPassword: '0123456789',
        newPasswordConfirm: '0123456789',
      });

      expect(result).toEqual({ ok: false, error: 'PASSWORD_ENTIRELY_NUMERIC' });
    });

    it('reports a missing user', async () => {
      usersRepository.findById.mockResolvedValue(null);

      await expect(usersService.changePassword(user.id, dto)).resolves.toEqual({
        ok: false,
        error: 'USER_NOT_FOUND',
      });
    });
  });

  describe('deactivate', () => {
    it('flips the account to inactive', async () => {
      usersRepository.findById.mockResolvedValue(user);

      await expect(usersService.deactivate(user.id)).resolves.toEqual({ ok: true, value: undefined });
      expect(usersRepository.deactivate).toHaveBeenCalledWith(user.id);
    });

    it('reports a missing user', async () => {
      usersRepository.findById.mockResolvedValue(null);

      await expect(usersService.deactivate(user.id)).resolves.toEqual({
        ok: false,
        error: 'USER_NOT_FOUND',
      });
      expect(usersRepository.deactivate).not.toHaveBeenCalled();
    });
  });

  describe('listActive', () => {
    it('returns the normalised window with the total active count', async () => {
      usersRepository.listActive.mockResolvedValue([user]);
      usersRepository.countActive.mockResolvedValue(41);

      const page = await usersService.listActive(3, 500);

      expect(usersRepository.listActive).toHaveBeenCalledWith(200, 100);
      expect(page).toMatchObject({
        total: 41,
        page: 3,
        pageSize: 100,
        users: [{ id: user.id, email: user.email, dateJoined: user.createdAt }],
      });
    });

    it('defaults to the first page of 20', async () => {
      usersRepository.listActive.mockResolvedValue([]);
      usersRepository.countActive.mockResolvedValue(0);

      await expect(usersService.listActive()).resolves.toEqual({
        users: [],
        total: 0,
        page: 1,
        pageSize: 20,
      });
      expect(usersRepository.listActive).toHaveBeenCalledWith(0, 20);
    });
  });
});
