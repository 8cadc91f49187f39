import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';

export const EMAIL_VERIFICATION_PURPOSE = 'email_verification';
export const EMAIL_VERIFICATION_PATH = '/api/users/verify-email';

/**
 * Mints the 24-hour links sent in welcome emails. The accounts service
 * verifies them with the same JWT_SECRET.
 */
@Injectable()
export class EmailVerificationTokenService {
  constructor(
    private readonly jwtService: JwtService,
    private readonly configService: ConfigService,
  ) {}

  issue(userId: number): string {
    return this.jwtService.sign(
      { sub: String(userId), purpose: EMAIL_VERIFICATION_PURPOSE },
      { expiresIn: '24h' },
    );
  }

  verificationUrl(userId: number): string {
    const baseUrl = this.configService
      .getOrThrow<string>('APP_BASE_URL')
      .replace(/\/+$/, '');
    const url = new URL(`${baseUrl}${EMAIL_VERIFICATION_PATH}`);
    url.searchParams.set('token', this.issue(userId));
    return url.toString();
  }
}
