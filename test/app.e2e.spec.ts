import { INestApplication } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import request from 'supertest';
import { ApiModule } from '../src/api.module';
import { configureApp } from '../src/app.setup';
import { Contact } from '../src/database/entities/contact.entity';
import { User } from '../src/database/entities/user.entity';
import { UserRole } from '../src/database/enums/user-role.enum';
import { CredentialsService } from '../src/modules/auth/credentials.service';
import {
  formatCalendarDate,
  today,
} from '../src/modules/contacts/birthday.util';
import { ContactsRepository } from '../src/modules/contacts/contacts.repository';
import { MailService } from '../src/modules/mail/mail.service';
import { StorageService } from '../src/modules/storage/storage.service';
import { UsersRepository } from '../src/modules/users/users.repository';
import { UsersService } from '../src/modules/users/users.service';
import { InMemoryContactsRepository } from './fakes/in-memory-contacts.repository';
import { InMemoryUsersRepository } from './fakes/in-memory-users.repository';

interface SentMail {
  email: string;
  url: string;
}

describe('Contacts API (e2e)', () => {
  let app: INestApplication;
  let verificationMails: SentMail[];
  let resetMails: SentMail[];

  const tokenFrom = (mail: SentMail | undefined): string => {
    const token = mail ? new URL(mail.url).searchParams.get('token') : null;
    if (!token) throw new Error('no token in mailed link');
    return token;
  };

  const register = (email: string, password = 'password123') =>
    request(app.getHttpServer())
      .post('/api/auth/register')
      .send({ email, password, fullName: 'Test User' });

  const login = async (email: string, password = 'password123'): Promise<string> => {
    const response = await request(app.getHttpServer())
      .post('/api/auth/login')
      .send({ email, password })
      .expect(200);
    const accessToken: unknown = response.body.accessToken;
    if (typeof accessToken !== 'string') throw new Error('login returned no token');
    return accessToken;
  };

  /** Registers, verifies through the mailed link and logs in. */
  const signUp = async (email: string): Promise<string> => {
    await register(email).expect(201);
    const mail = verificationMails.find((sent) => sent.email === email);
    await request(app.getHttpServer())
      .get('/api/auth/verify')
      .query({ token: tokenFrom(mail) })
      .expect(200);
    return login(email);
  };

  beforeEach(async () => {
    verificationMails = [];
    resetMails = [];

    const module = await Test.createTestingModule({ imports: [ApiModule] })
      .overrideProvider(getRepositoryToken(User))
      .useValue({})
      .overrideProvider(getRepositoryToken(Contact))
      .useValue({})
      .overrideProvider(UsersRepository)
      .useValue(new InMemoryUsersRepository())
      .overrideProvider(ContactsRepository)
      .useValue(new InMemoryContactsRepository())
      .overrideProvider(MailService)
      .useValue({
        sendVerificationEmail: (email: string, url: string) => {
          verificationMails.push({ email, url });
          return Promise.resolve();
        },
        sendPasswordResetEmail: (email: string, url: string) => {
          resetMails.push({ email, url });
          return Promise.resolve();
        },
      })
      .overrideProvider(StorageService)
      .useValue({
        uploadAvatar: (userId: number) =>
          Promise.resolve(`http://storage.test/contacts-avatars/avatars/user_${userId}`),
      })
      .compile();

    app = module.createNestApplication();
    configureApp(app);
    await app.init();
  });

  afterEach(async () => {
    await app.close();
  });

  it('GET /api/health', async () => {
    await request(app.getHttpServer())
      .get('/api/health')
      .expect(200, { status: 'healthy', version: '2.1.0' });
  });

  describe('registration and login', () => {
    it('registers an unverified user and mails a verification link', async () => {
      const response = await register('  Ada@Example.com ').expect(201);

      expect(response.body).toEqual({
        id: 1,
        email: 'ada@example.com',
        fullName: 'Test User',
        avatarUrl: null,
        isActive: true,
        isVerified: false,
        role: 'user',
      });
      expect(verificationMails).toHaveLength(1);
      expect(verificationMails[0].url.startsWith('http://api.test/api/auth/verify?token=')).toBe(
        true,
      );
    });

    it('rejects a second registration of the same email', async () => {
      await register('ada@example.com').expect(201);

      const response = await register('ADA@example.com').expect(409);

      expect(response.body.message).toBe('Email already registered');
    });

    it('reports validation failures per field', async () => {
      const response = await request(app.getHttpServer())
        .post('/api/auth/register')
        .send({ email: 'not-an-email', password: 'short' })
        .expect(400);

      expect(response.body.success).toBe(false);
      expect(Object.keys(response.body.errors).sort()).toEqual(['email', 'password']);
    });

    it('refuses login until the email is verified', async () => {
      await register('ada@example.com').expect(201);

      const response = await request(app.getHttpServer())
        .post('/api/auth/login')
        .send({ email: 'ada@example.com', password: 'password123' })
        .expect(401);

      expect(response.body.message).toBe(
        'Email not verified. Please verify your email to access this resource.',
      );
    });

    it('refuses a wrong password', async () => {
      await signUp('ada@example.com');

      const response = await request(app.getHttpServer())
        .post('/api/auth/login')
        .send({ email: 'ada@example.com', password: 'password124' })
        .expect(401);

      expect(response.body.message).toBe('Incorrect email or password');
    });

    it('rejects a forged verification token', async () => {
      const response = await request(app.getHttpServer())
        .get('/api/auth/verify')
        .query({ token: 'forged' })
        .expect(400);

      expect(response.body.message).toBe('Invalid or expired token');
    });

    it('answers resend requests the same way for unknown addresses', async () => {
      const response = await request(app.getHttpServer())
        .post('/api/auth/resend-verification')
        .send({ email: 'nobody@example.com' })
        .expect(200);

      expect(response.body).toEqual({
        message: 'If the email exists, a verification link will be sent',
      });
      expect(verificationMails).toHaveLength(0);
    });
  });

  describe('sessions', () => {
    it('returns the profile of the bearer', async () => {
      const token = await signUp('ada@example.com');

      const response = await request(app.getHttpServer())
        .get('/api/users/me')
        .set('Authorization', `Bearer ${token}`)
        .expect(200);

      expect(response.body).toEqual({
        id: 1,
        email: 'ada@example.com',
        fullName: 'Test User',
        avatarUrl: null,
        isActive: true,
        isVerified: true,
        role: 'user',
      });
    });

    it('requires a bearer token', async () => {
      const response = await request(app.getHttpServer()).get('/api/users/me').expect(401);

      expect(response.body.message).toBe('Incorrect email or password');
    });

    it('rejects a garbage or expired token', async () => {
      await signUp('ada@example.com');
      const expired = app
        .get(CredentialsService)
        .issueAccessToken({ userId: 1, email: 'ada@example.com' }, -60);

      for (const token of ['garbage', expired]) {
        await request(app.getHttpServer())
          .get('/api/users/me')
          .set('Authorization', `Bearer ${token}`)
          .expect(401);
      }
    });

    it('locks out a deactivated user on the next request', async () => {
      const token = await signUp('ada@example.com');
      await request(app.getHttpServer())
        .get('/api/users/me')
        .set('Authorization', `Bearer ${token}`)
        .expect(200);

      await app.get(UsersService).updateStatus(1, false);

      const response = await request(app.getHttpServer())
        .get('/api/users/me')
        .set('Authorization', `Bearer ${token}`)
        .expect(401);
      expect(response.body.message).toBe('Account is inactive');
    });
  });

  describe('password reset', () => {
    it('resets the password once per token', async () => {
      await signUp('ada@example.com');

      await request(app.getHttpServer())
        .post('/api/auth/request-password-reset')
        .send({ email: 'ada@example.com' })
        .expect(202, { message: 'If the email exists, a password reset link will be sent' });
      const token = tokenFrom(resetMails[0]);

      await request(app.getHttpServer())
        .get('/api/auth/reset-password')
        .query({ token })
        .expect(200, { message: 'Token is valid' });
      await request(app.getHttpServer())
        .post('/api/auth/reset-password')
        .send({ token, newPassword: 'new-password-1' })
        .expect(200, { message: 'Password reset successfully' });
      await request(app.getHttpServer())
        .post('/api/auth/reset-password')
        .send({ token, newPassword: 'new-password-2' })
        .expect(400);

      await request(app.getHttpServer())
        .post('/api/auth/login')
        .send({ email: 'ada@example.com', password: 'password123' })
        .expect(401);
      await login('ada@example.com', 'new-password-1');
    });

    it('mails nothing for an unknown address', async () => {
      await request(app.getHttpServer())
        .post('/api/auth/request-password-reset')
        .send({ email: 'nobody@example.com' })
        .expect(202);

      expect(resetMails).toHaveLength(0);
    });
  });

  describe('administration', () => {
    it('lets an admin change roles and forbids everyone else', async () => {
      const adminToken = await signUp('admin@example.com');
      const userToken = await signUp('ada@example.com');
      await app.get(UsersService).updateRole(1, UserRole.ADMIN);

      const forbidden = await request(app.getHttpServer())
        .patch('/api/users/1/role')
        .set('Authorization', `Bearer ${userToken}`)
        .send({ role: 'user' })
        .expect(403);
      expect(forbidden.body.message).toBe('You do not have permission to perform this action');

      await request(app.getHttpServer())
        .patch('/api/users/2/role')
        .set('Authorization', `Bearer ${adminToken}`)
        .send({ role: 'admin' })
        .expect(200);

      const me = await request(app.getHttpServer())
        .get('/api/users/me')
        .set('Authorization', `Bearer ${userToken}`)
        .expect(200);
      expect(me.body.role).toBe('admin');
    });

    it('rejects user ids beyond the integer key range', async () => {
      const adminToken = await signUp('admin@example.com');
      await app.get(UsersService).updateRole(1, UserRole.ADMIN);

      await request(app.getHttpServer())
        .patch('/api/users/99999999999/status')
        .set('Authorization', `Bearer ${adminToken}`)
        .send({ isActive: false })
        .expect(400);
    });

    it('reports an unknown user', async () => {
      const adminToken = await signUp('admin@example.com');
      await app.get(UsersService).updateRole(1, UserRole.ADMIN);

      const response = await request(app.getHttpServer())
        .patch('/api/users/99/status')
        .set('Authorization', `Bearer ${adminToken}`)
        .send({ isActive: false })
        .expect(404);
      expect(response.body.message).toBe('User not found');
    });

    it('stores an admin avatar and checks its type', async () => {
      const adminToken = await signUp('admin@example.com');
      await app.get(UsersService).updateRole(1, UserRole.ADMIN);

      const rejected = await request(app.getHttpServer())
        .patch('/api/users/me/avatar')
        .set('Authorization', `Bearer ${adminToken}`)
        .attach('file', Buffer.from('plain text'), {
          filename: 'notes.txt',
          contentType: 'text/plain',
        })
        .expect(400);
      expect(rejected.body.message).toBe('Avatar must be a JPEG, PNG, GIF or WebP image');

      const response = await request(app.getHttpServer())
        .patch('/api/users/me/avatar')
        .set('Authorization', `Bearer ${adminToken}`)
        .attach('file', Buffer.from('fake-image-bytes'), {
          filename: 'avatar.png',
          contentType: 'image/png',
        })
        .expect(200);
      expect(response.body.avatarUrl).toBe(
        'http://storage.test/contacts-avatars/avatars/user_1',
      );
    });
  });

  describe('contacts', () => {
    const ada = {
      firstName: 'Ada',
      lastName: 'Lovelace',
      email: 'ada.lovelace@example.com',
      phone: '+44 20 7946 0000',
      birthday: '1815-12-10',
    };

    it('keeps each address book private', async () => {
      const owner = await signUp('owner@example.com');
      const stranger = await signUp('stranger@example.com');

      const created = await request(app.getHttpServer())
        .post('/api/contacts')
        .set('Authorization', `Bearer ${owner}`)
        .send(ada)
        .expect(201);
      expect(created.body).toEqual({ ...ada, id: 1, notes: null, userId: 1 });

      const hidden = await request(app.getHttpServer())
        .get('/api/contacts/1')
        .set('Authorization', `Bearer ${stranger}`)
        .expect(404);
      expect(hidden.body.message).toBe('Contact with id 1 not found');

      const listed = await request(app.getHttpServer())
        .get('/api/contacts')
        .set('Authorization', `Bearer ${stranger}`)
        .expect(200);
      expect(listed.body).toEqual({ items: [], total: 0, limit: 20, offset: 0 });
    });

    it('updates, searches and deletes', async () => {
      const owner = await signUp('owner@example.com');
      await request(app.getHttpServer())
        .post('/api/contacts')
        .set('Authorization', `Bearer ${owner}`)
        .send(ada)
        .expect(201);

      await request(app.getHttpServer())
        .patch('/api/contacts/1')
        .set('Authorization', `Bearer ${owner}`)
        .send({ notes: 'first programmer' })
        .expect(200);

      const found = await request(app.getHttpServer())
        .get('/api/contacts')
        .query({ q: 'love', limit: 5 })
        .set('Authorization', `Bearer ${owner}`)
        .expect(200);
      expect(found.body.total).toBe(1);
      expect(found.body.limit).toBe(5);
      expect(found.body.items[0].notes).toBe('first programmer');

      await request(app.getHttpServer())
        .delete('/api/contacts/1')
        .set('Authorization', `Bearer ${owner}`)
        .expect(200, { message: 'Contact 1 deleted' });
      await request(app.getHttpServer())
        .get('/api/contacts/1')
        .set('Authorization', `Bearer ${owner}`)
        .expect(404);
    });

    it('refuses to null out required fields on patch', async () => {
      const owner = await signUp('owner@example.com');
      await request(app.getHttpServer())
        .post('/api/contacts')
        .set('Authorization', `Bearer ${owner}`)
        .send(ada)
        .expect(201);

      const nullEmail = await request(app.getHttpServer())
        .patch('/api/contacts/1')
        .set('Authorization', `Bearer ${owner}`)
        .send({ email: null })
        .expect(400);
      expect(Object.keys(nullEmail.body.errors)).toEqual(['email']);

      const nullFields = await request(app.getHttpServer())
        .patch('/api/contacts/1')
        .set('Authorization', `Bearer ${owner}`)
        .send({ firstName: null, birthday: null })
        .expect(400);
      expect(Object.keys(nullFields.body.errors).sort()).toEqual(['birthday', 'firstName']);

      const cleared = await request(app.getHttpServer())
        .patch('/api/contacts/1')
        .set('Authorization', `Bearer ${owner}`)
        .send({ notes: null })
        .expect(200);
      expect(cleared.body).toEqual({ ...ada, id: 1, notes: null, userId: 1 });
    });

    it('rejects ids beyond the integer key range', async () => {
      const owner = await signUp('owner@example.com');

      const response = await request(app.getHttpServer())
        .get('/api/contacts/99999999999')
        .set('Authorization', `Bearer ${owner}`)
        .expect(400);
      expect(Object.keys(response.body.errors)).toEqual(['id']);
    });

    it('rejects a duplicate contact email', async () => {
      const owner = await signUp('owner@example.com');
      await request(app.getHttpServer())
        .post('/api/contacts')
        .set('Authorization', `Bearer ${owner}`)
        .send(ada)
        .expect(201);

      const response = await request(app.getHttpServer())
        .post('/api/contacts')
        .set('Authorization', `Bearer ${owner}`)
        .send({ ...ada, email: 'ADA.LOVELACE@example.com' })
        .expect(409);
      expect(response.body.message).toBe('Contact with this email already exists');
    });

    it('validates contact fields', async () => {
      const owner = await signUp('owner@example.com');

      const response = await request(app.getHttpServer())
        .post('/api/contacts')
        .set('Authorization', `Bearer ${owner}`)
        .send({ ...ada, phone: 'call me', birthday: '2023-02-29' })
        .expect(400);

      expect(response.body.success).toBe(false);
      expect(Object.keys(response.body.errors).sort()).toEqual(['birthday', 'phone']);
    });

    it('lists birthdays coming up this week', async () => {
      const owner = await signUp('owner@example.com');
      const now = today();
      const birthday = formatCalendarDate({ year: 2000, month: now.month, day: now.day });
      await request(app.getHttpServer())
        .post('/api/contacts')
        .set('Authorization', `Bearer ${owner}`)
        .send({ ...ada, birthday })
        .expect(201);

      const upcoming = await request(app.getHttpServer())
        .get('/api/contacts/upcoming-birthdays')
        .set('Authorization', `Bearer ${owner}`)
        .expect(200);
      expect(upcoming.body.map((contact: { id: number }) => contact.id)).toEqual([1]);

      const invalid = await request(app.getHttpServer())
        .get('/api/contacts/upcoming-birthdays')
        .query({ days: 0 })
        .set('Authorization', `Bearer ${owner}`)
        .expect(400);
      expect(Object.keys(invalid.body.errors)).toEqual(['days']);
    });
  });
});
