import { UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtStrategy } from './jwt.strategy';

describe('JwtStrategy', () => {
  const strategy = new JwtStrategy(new ConfigService({ JWT_SECRET: 'test-secret' }));

  it('maps the token payload to the request user', () => {
    expect(strategy.validate({ sub: 'u-1', email: 'teacher@example.test' })).toEqual({ id: 'u-1', email: 'teacher@example.test' });
  });

  it('rejects a payload without a subject', () => {
    expect(() => strategy.validate({ sub: '', email: 'teacher@example.test' })).toThrow(UnauthorizedException);
  });
});
