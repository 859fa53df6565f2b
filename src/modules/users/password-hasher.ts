import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as bcrypt from 'bcrypt';

export const PASSWORD_HASHER = 'PASSWORD_HASHER';

export interface PasswordHasher {
  hash(plain: string): Promise<string>;
  verify(plain: string, hash: string): Promise<boolean>;
}

export const DEFAULT_BCRYPT_ROUNDS = 10;

/** BCRYPT_ROUNDS outside bcrypt's 4..31 range falls back to the default. */
export function parseBcryptRounds(raw: string | undefined): number {
  const rounds = Number(raw);
  return Number.isInteger(rounds) && rounds >= 4 && rounds <= 31 ? rounds : DEFAULT_BCRYPT_ROUNDS;
}

@Injectable()
export class BcryptPasswordHasher implements PasswordHasher {
  private readonly rounds: number;

  constructor(config: ConfigService) {
    this.rounds = parseBcryptRounds(config.get<string>('BCRYPT_ROUNDS'));
  }

  hash(plain: string): Promise<string> {
    return bcrypt.hash(plain, this.rounds);
  }

  verify(plain: string, hash: string): Promise<boolean> {
    return bcrypt.compare(plain, hash);
  }
}
