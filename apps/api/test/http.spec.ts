import { DynamicModule, INestApplication, Module, ValidationPipe } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { Test } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import cookieParser from 'cookie-parser';
import request from 'supertest';
import { User } from '@sessiongate/database';
import { SESSION_STORE } from '@sessiongate/redis';
import { AdminModule } from '../src/admin/admin.module';
import { AuthModule } from '../src/auth/auth.module';
import { AUTH_CONFIG } from '../src/config/auth.config';
import { UsersModule } from '../src/users/users.module';
import { UsersRepository } from '../src/users/users.repository';
import { InMemoryCredentialStore } from './fakes/in-memory-credential-store';
import { InMemorySessionStore } from './fakes/in-memory-session-store';
import { buildTestAuthConfig, TEST_SECRET } from './fixtures/auth-config';

@Module({})
class TestInfrastructureModule {
  static register(sessions: InMemorySessionStore): DynamicModule {
    return {
      module: TestInfrastructureModule,
      global: true,
      providers: [
        { provide: SESSION_STORE, useValue: sessions },
        { provide: AUTH_CONFIG, useValue: buildTestAuthConfig() },
      ],
      exports: [SESSION_STORE, AUTH_CONFIG],
    };
  }
}

function cookieNamed(res: request.Response, name: string): string | undefined {
  const cookies: string[] = res.get('Set-Cookie') ?? [];
  return cookies.find((cookie) => cookie.startsWith(`${name}=`));
}

describe('HTTP surface', () => {
  let app: INestApplication;
  let users: InMemoryCredentialStore;
  let sessions: InMemorySessionStore;

  beforeEach(async () => {
    users = new InMemoryCredentialStore();
    sessions = new InMemorySessionStore();

    const moduleRef = await Test.createTestingModule({
      imports: [
        TestInfrastructureModule.register(sessions),
        UsersModule,
        AuthModule,
        AdminModule,
      ],
    })
      .overrideProvider(getRepositoryToken(User))
      .useValue({})
      .overrideProvider(UsersRepository)
      .useValue(users)
      .compile();

    app = moduleRef.createNestApplication({ logger: false });
    app.use(cookieParser());
    app.useGlobalPipes(
      new ValidationPipe({ whitelist: true, forbidNonWhitelisted: true, transform: true }),
    );
    await app.init();
  });

  afterEach(async () => {
    await app.close();
  });

  async function registerAndLogin(
    username: string,
    superuser = false,
  ): Promise<{ userId: string; accessToken: string; refreshToken: string }> {
    const registered = await request(app.getHttpServer())
      .post('/auth/register')
      .send({ username, email: `${username}@x.com`, password: 'secret123' })
      .expect(201);
    const account = users.users.get(registered.body.id);
    if (account) account.isSuperuser = superuser;

    const login = await request(app.getHttpServer())
      .post('/auth/login')
      .send({ username, password: 'secret123' })
      .expect(200);

    return {
      userId: registered.body.id,
      accessToken: login.body.accessToken,
      refreshToken: login.body.refreshToken,
    };
  }

  describe('POST /auth/register', () => {
    it('creates an account and returns its identity without the hash', async () => {
      const res = await request(app.getHttpServer())
        .post('/auth/register')
        .send({ username: 'alice', email: 'A@x.com', password: 'secret123' })
        .expect(201);

      expect(res.body).toMatchObject({
        username: 'alice',
        email: 'a@x.com',
        isActive: true,
        isSuperuser: false,
        isVerified: false,
      });
      expect(res.body.passwordHash).toBeUndefined();
    });

    it('answers 409 for a taken username', async () => {
      await registerAndLogin('alice');

      const res = await request(app.getHttpServer())
        .post('/auth/register')
        .send({ username: 'alice', email: 'other@x.com', password: 'secret123' })
        .expect(409);

      expect(res.body.message).toBe('Username "alice" is already taken');
    });

    it('answers 400 for a short password', async () => {
      await request(app.getHttpServer())
        .post('/auth/register')
        .send({ username: 'alice', email: 'a@x.com', password: 'short' })
        .expect(400);
    });
  });

  describe('POST /auth/login', () => {
    it('returns the pair and sets http-only, same-site cookies', async () => {
      await registerAndLogin('alice');

      const res = await request(app.getHttpServer())
        .post('/auth/login')
        .send({ username: 'alice', password: 'secret123' })
        .expect(200);

      expect(res.body.tokenType).toBe('Bearer');
      expect(res.body.expiresIn).toBe(900);

      const accessCookie = cookieNamed(res, 'access_token');
      expect(accessCookie).toContain(`access_token=${res.body.accessToken}`);
      expect(accessCookie).toContain('Max-Age=900');
      expect(accessCookie).toContain('Path=/');
      expect(accessCookie).toContain('HttpOnly');
      expect(accessCookie).toContain('SameSite=Lax');
      expect(cookieNamed(res, 'refresh_token')).toContain(
        `refresh_token=${res.body.refreshToken}`,
      );
    });

    it('answers 401 with one message for a wrong password', async () => {
      await registerAndLogin('alice');

      const res = await request(app.getHttpServer())
        .post('/auth/login')
        .send({ username: 'alice', password: 'wrong-password' })
        .expect(401);

      expect(res.body.message).toBe('Invalid username or password');
    });
  });

  describe('access gate', () => {
    it('serves /users/me for the access_token cookie', async () => {
      const { userId, accessToken } = await registerAndLogin('alice');

      const res = await request(app.getHttpServer())
        .get('/users/me')
        .set('Cookie', `access_token=${accessToken}`)
        .expect(200);

      expect(res.body.id).toBe(userId);
      expect(res.body.username).toBe('alice');
    });

    it('serves /users/me for a bearer header', async () => {
      const { accessToken } = await registerAndLogin('alice');

      await request(app.getHttpServer())
        .get('/users/me')
        .set('Authorization', `Bearer ${accessToken}`)
        .expect(200);
    });

    it('redirects to login and clears cookies without a token', async () => {
      const res = await request(app.getHttpServer()).get('/users/me').expect(302);

      expect(res.headers.location).toBe('/login');
      expect(cookieNamed(res, 'access_token')).toContain('Expires=Thu, 01 Jan 1970 00:00:00 GMT');
      expect(cookieNamed(res, 'refresh_token')).toContain('Expires=Thu, 01 Jan 1970 00:00:00 GMT');
    });

    it('redirects an expired token to the refresh route with the original URL', async () => {
      const { userId } = await registerAndLogin('alice');
      const expired = new JwtService().sign(
        {
          sub: userId,
          type: 'access',
          jti: 'expired',
          exp: Math.floor(Date.now() / 1000) - 10,
        },
        { secret: TEST_SECRET, algorithm: 'HS256' },
      );

      const res = await request(app.getHttpServer())
        .get('/users/me?tab=profile')
        .set('Cookie', `access_token=${expired}`)
        .expect(302);

      expect(res.headers.location).toBe('/auth/refresh?redirect_url=%2Fusers%2Fme%3Ftab%3Dprofile');
      expect(cookieNamed(res, 'access_token')).toBeUndefined();
    });

    it('sends a signed-in user from the login page to home', async () => {
      const { accessToken } = await registerAndLogin('alice');

      const res = await request(app.getHttpServer())
        .get('/login')
        .set('Cookie', `access_token=${accessToken}`)
        .expect(302);

      expect(res.headers.location).toBe('/');
    });

    it('answers 403 on admin routes for a regular user and keeps cookies', async () => {
      const { accessToken } = await registerAndLogin('alice');

      const res = await request(app.getHttpServer())
        .get('/admin/sessions')
        .set('Cookie', `access_token=${accessToken}`)
        .expect(403);

      expect(res.body).toEqual({
        statusCode: 403,
        error: 'Forbidden',
        message: 'Administrator privileges required',
      });
      expect(cookieNamed(res, 'access_token')).toBeUndefined();
    });

    it.each(['/ADMIN/sessions', '/Admin/Sessions/', '//admin/sessions', '/admin//sessions'])(
      'answers 403 on %s for a regular user',
      async (path) => {
        const { accessToken } = await registerAndLogin('alice');

        const res = await request(app.getHttpServer())
          .get(path)
          .set('Cookie', `access_token=${accessToken}`)
          .expect(403);

        expect(res.body.message).toBe('Administrator privileges required');
      },
    );

    it('lets a superuser reach the admin routes under another case', async () => {
      const { accessToken } = await registerAndLogin('root', true);

      const res = await request(app.getHttpServer())
        .get('/ADMIN/sessions')
        .set('Cookie', `access_token=${accessToken}`)
        .expect(200);

      expect(res.body.map((entry: { username: string }) => entry.username)).toEqual(['root']);
    });

    it.each(['/USERS/ME', '/users/me/', '//users/me', '/Users//Me'])(
      'redirects %s to login without a token',
      async (path) => {
        const res = await request(app.getHttpServer()).get(path).expect(302);

        expect(res.headers.location).toBe('/login');
      },
    );

    it('answers 500 without detail when the session store is down', async () => {
      const { accessToken } = await registerAndLogin('alice');
      sessions.failOn('get');

      const res = await request(app.getHttpServer())
        .get('/users/me')
        .set('Cookie', `access_token=${accessToken}`)
        .expect(500);

      expect(res.body.message).toBe('Internal server error');
    });
  });

  describe('refresh', () => {
    it('exchanges a refresh token from the body for a new pair', async () => {
      const { refreshToken } = await registerAndLogin('alice');

      const res = await request(app.getHttpServer())
        .post('/auth/refresh')
        .send({ refreshToken })
        .expect(200);

      expect(res.body.refreshToken).not.toBe(refreshToken);
      expect(cookieNamed(res, 'access_token')).toContain(`access_token=${res.body.accessToken}`);
    });

    it('answers 401 when given an access token', async () => {
      const { accessToken } = await registerAndLogin('alice');

      const res = await request(app.getHttpServer())
        .post('/auth/refresh')
        .send({ refreshToken: accessToken })
        .expect(401);

      expect(res.body.message).toBe('Invalid or revoked token');
    });

    it('refreshes from the cookie and returns to a same-origin URL', async () => {
      const { refreshToken } = await registerAndLogin('alice');

      const res = await request(app.getHttpServer())
        .get('/auth/refresh?redirect_url=%2Fusers%2Fme')
        .set('Cookie', `refresh_token=${refreshToken}`)
        .expect(302);

      expect(res.headers.location).toBe('/users/me');
      expect(cookieNamed(res, 'access_token')).toContain('HttpOnly');
    });

    it('does not follow an off-site redirect_url', async () => {
      const { refreshToken } = await registerAndLogin('alice');

      const res = await request(app.getHttpServer())
        .get('/auth/refresh?redirect_url=%2F%2Fevil.example')
        .set('Cookie', `refresh_token=${refreshToken}`)
        .expect(302);

      expect(res.headers.location).toBe('/');
    });

    it('answers 500 and keeps the cookies when the session store is down', async () => {
      const { refreshToken } = await registerAndLogin('alice');
      sessions.failOn('get');

      const res = await request(app.getHttpServer())
        .get('/auth/refresh?redirect_url=%2Fusers%2Fme')
        .set('Cookie', `refresh_token=${refreshToken}`)
        .expect(500);

      expect(res.body.message).toBe('Internal server error');
      expect(res.headers.location).toBeUndefined();
      expect(cookieNamed(res, 'access_token')).toBeUndefined();
      expect(cookieNamed(res, 'refresh_token')).toBeUndefined();
    });

    it('sends a failed cookie refresh to login', async () => {
      const res = await request(app.getHttpServer())
        .get('/auth/refresh?redirect_url=%2Fusers%2Fme')
        .expect(302);

      expect(res.headers.location).toBe('/login');
      expect(cookieNamed(res, 'refresh_token')).toContain('Expires=Thu, 01 Jan 1970 00:00:00 GMT');
    });
  });

  describe('POST /auth/logout', () => {
    it('ends the session and clears the cookies', async () => {
      const { accessToken } = await registerAndLogin('alice');

      const res = await request(app.getHttpServer())
        .post('/auth/logout')
        .set('Authorization', `Bearer ${accessToken}`)
        .expect(204);

      expect(cookieNamed(res, 'access_token')).toContain('Expires=Thu, 01 Jan 1970 00:00:00 GMT');

      const after = await request(app.getHttpServer())
        .get('/users/me')
        .set('Authorization', `Bearer ${accessToken}`)
        .expect(302);
      expect(after.headers.location).toBe('/login');
    });
  });

  describe('admin sessions', () => {
    it('lists, terminates one and terminates all', async () => {
      const root = await registerAndLogin('root', true);
      const alice = await registerAndLogin('alice');
      await registerAndLogin('bob');
      const asRoot = `access_token=${root.accessToken}`;

      const listing = await request(app.getHttpServer())
        .get('/admin/sessions')
        .set('Cookie', asRoot)
        .expect(200);
      expect(listing.body.map((entry: { username: string }) => entry.username)).toEqual([
        'root',
        'alice',
        'bob',
      ]);

      await request(app.getHttpServer())
        .delete(`/admin/sessions/${alice.userId}`)
        .set('Cookie', asRoot)
        .expect(200, { userId: alice.userId, terminated: true });

      await request(app.getHttpServer())
        .get('/users/me')
        .set('Authorization', `Bearer ${alice.accessToken}`)
        .expect(302);

      await request(app.getHttpServer())
        .delete('/admin/sessions')
        .set('Cookie', asRoot)
        .expect(200, { terminated: 2 });
    });
  });
});
