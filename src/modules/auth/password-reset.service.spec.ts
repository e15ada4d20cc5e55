import { ConfigService } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';
import { InMemoryCacheService } from '../../cache/in-memory-cache.service';
import { PasswordResetService } from './password-reset.service';

const RESET_SECRET = 'test-reset-secret';
const NOW = new Date('2024-01-01T00:00:00Z');

describe('PasswordResetService', () => {
  const jwt = new JwtService();
  const service = new PasswordResetService(
    jwt,
    new ConfigService({
      passwordReset: { secret: RESET_SECRET, expiresIn: 1800 },
    }),
  );
  let cache: InMemoryCacheService;

  beforeEach(() => {
    jest.useFakeTimers({ now: NOW });
    cache = new InMemoryCacheService(new ConfigService({ cache: { max: 100 } }));
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  const sign = (payload: Record<string, unknown>, secret = RESET_SECRET): string =>
    jwt.sign(payload, { secret, algorithm: 'HS512' });

  it('validates a freshly issued token', async () => {
    const { token, jti } = await service.create(cache, 3, 'grace@example.com');

    await expect(service.validate(cache, token)).resolves.toEqual({
      userId: 3,
      email: 'grace@example.com',
      jti,
      issuedAt: NOW,
    });
    await expect(cache.getJson(`reset:${jti}`)).resolves.toEqual({
      userId: 3,
      email: 'grace@example.com',
      used: false,
    });
  });

  it('refuses a token once it has been invalidated', async () => {
    const { token, jti } = await service.create(cache, 3, 'grace@example.com');

    await expect(service.invalidate(cache, jti)).resolves.toBe(true);
    await expect(service.validate(cache, token)).resolves.toBeNull();
    await expect(service.invalidate(cache, jti)).resolves.toBe(true);
  });

  it('lets only one caller consume a token', async () => {
    const { token, jti } = await service.create(cache, 3, 'grace@example.com');

    const claims = await Promise.all([service.consume(cache, jti), service.consume(cache, jti)]);

    expect(claims.filter(Boolean)).toHaveLength(1);
    await expect(service.validate(cache, token)).resolves.toBeNull();
  });

  it('treats every consume as successful without a cache', async () => {
    await expect(service.consume(null, 'any-jti')).resolves.toBe(true);
  });

  it('refuses a token older than the reset window', async () => {
    const { token } = await service.create(cache, 3, 'grace@example.com');

    jest.setSystemTime(NOW.getTime() + 1799 * 1000);
    await expect(service.validate(cache, token)).resolves.not.toBeNull();

    jest.setSystemTime(NOW.getTime() + 1800 * 1000);
    await expect(service.validate(cache, token)).resolves.toBeNull();
  });

  it('keeps a token reusable when there is no cache', async () => {
    const { token } = await service.create(null, 3, 'grace@example.com');

    await expect(service.validate(null, token)).resolves.not.toBeNull();
    await expect(service.validate(null, token)).resolves.not.toBeNull();
    await expect(service.invalidate(null, 'any-jti')).resolves.toBe(false);
  });

  it('refuses a token whose jti was never recorded', async () => {
    const token = sign({ sub: '3', email: 'grace@example.com', jti: 'unknown-jti' });

    await expect(service.validate(cache, token)).resolves.toBeNull();
  });

  it('refuses a token signed with another secret', async () => {
    const { jti } = await service.create(cache, 3, 'grace@example.com');
    const forged = sign({ sub: '3', email: 'grace@example.com', jti }, 'other-secret');

    await expect(service.validate(cache, forged)).resolves.toBeNull();
  });

  it('refuses a token signed with the access-token algorithm', async () => {
    const { jti } = await service.create(cache, 3, 'grace@example.com');
    const token = jwt.sign(
      { sub: '3', email: 'grace@example.com', jti },
      { secret: RESET_SECRET, algorithm: 'HS256' },
    );

    await expect(service.validate(cache, token)).resolves.toBeNull();
  });

  it('refuses malformed claims', async () => {
    await cache.setJson('reset:jti-1', { userId: 3 }, 60);

    await expect(
      service.validate(cache, sign({ sub: 'abc', email: 'grace@example.com', jti: 'jti-1' })),
    ).resolves.toBeNull();
    await expect(
      service.validate(cache, sign({ sub: '3', email: 'grace@example.com' })),
    ).resolves.toBeNull();
  });
});
