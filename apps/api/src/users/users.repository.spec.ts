import { QueryFailedError, Repository } from 'typeorm';
import { User } from '@sessiongate/database';
import { UsersRepository, uniqueViolationOf } from './users.repository';

function uniqueViolation(constraint: string): QueryFailedError {
  const driverError = Object.assign(new Error('duplicate key value'), {
    code: '23505',
    constraint,
  });
  return new QueryFailedError('INSERT INTO "users"', [], driverError);
}

describe('UsersRepository', () => {
  const repository = {
    findOne: jest.fn(),
    create: jest.fn(),
    save: jest.fn(),
  };
  const users = new UsersRepository(repository as unknown as Repository<User>);
  const newUser = { username: 'alice', email: 'a@x.com', passwordHash: 'hash' };

  beforeEach(() => {
    jest.resetAllMocks();
    repository.create.mockImplementation((fields: Partial<User>) =>
      Object.assign(new User(), fields),
    );
  });

  it('looks users up by username', async () => {
    repository.findOne.mockResolvedValue(null);

    await expect(users.findByUsername('alice')).resolves.toBeNull();
    expect(repository.findOne).toHaveBeenCalledWith({ where: { username: 'alice' } });
  });

  it('saves a new user when neither column is taken', async () => {
    repository.findOne.mockResolvedValue(null);
    repository.save.mockImplementation(async (user: User) => Object.assign(user, { id: 'u-1' }));

    const result = await users.insert(newUser);

    expect(result._unsafeUnwrap().id).toBe('u-1');
    expect(repository.findOne).toHaveBeenCalledWith({
      where: [{ username: 'alice' }, { email: 'a@x.com' }],
      select: ['id', 'username', 'email'],
    });
  });

  it('reports which column an existing row collides with', async () => {
    repository.findOne.mockResolvedValue({ id: 'u-0', username: 'bob', email: 'a@x.com' });

    const result = await users.insert(newUser);

    expect(result._unsafeUnwrapErr()).toEqual({ field: 'email' });
    expect(repository.save).not.toHaveBeenCalled();
  });

  it('turns a unique violation raised by the insert into a conflict', async () => {
    repository.findOne.mockResolvedValue(null);
    repository.save.mockRejectedValue(uniqueViolation('UQ_users_username'));

    const result = await users.insert(newUser);

    expect(result._unsafeUnwrapErr()).toEqual({ field: 'username' });
  });

  it('rethrows other database failures', async () => {
    const failure = new Error('connection terminated');
    repository.findOne.mockResolvedValue(null);
    repository.save.mockRejectedValue(failure);

    await expect(users.insert(newUser)).rejects.toBe(failure);
  });
});

describe('uniqueViolationOf', () => {
  it('maps the email constraint', () => {
    expect(uniqueViolationOf(uniqueViolation('UQ_users_email'))).toEqual({ field: 'email' });
  });

  it('ignores errors that are not unique violations', () => {
    const notNull = new QueryFailedError(
      'INSERT INTO "users"',
      [],
      Object.assign(new Error('null value'), { code: '23502' }),
    );

    expect(uniqueViolationOf(notNull)).toBeNull();
    expect(uniqueViolationOf(new Error('boom'))).toBeNull();
  });
});
