/**
 * Authentication for the Slurm REST API (JWT tokens).
 * @module auth
 */

import { SlurmError } from '../errors/index.js';

/**
 * Secret string wrapper to prevent accidental exposure.
 */
export class SecretString {
  private readonly value: string;

  constructor(value: string) {
    this.value = value;
  }

  /**
   * Exposes the secret value.
   * Use with caution - avoid logging or displaying.
   */
  expose(): string {
    return this.value;
  }

  /**
   * Returns a safe representation for logging.
   */
  toString(): string {
    return '***';
  }

  /**
   * Custom JSON serialization to prevent accidental exposure.
   */
  toJSON(): string {
    return '***';
  }
}

/**
 * Token provider interface for dynamic token resolution.
 */
export interface TokenProvider {
  /**
   * Gets the current JWT.
   */
  getToken(): Promise<SecretString>;
}

/**
 * Static token provider using a fixed JWT.
 */
export class StaticTokenProvider implements TokenProvider {
  private readonly token: SecretString;

  constructor(token: string) {
    this.token = new SecretString(token);
  }

  async getToken(): Promise<SecretString> {
    return this.token;
  }
}

/**
 * Environment variable token provider. The variable is read on every call so
 * a rotated token is picked up without rebuilding the client.
 */
export class EnvTokenProvider implements TokenProvider {
  private readonly tokenVar: string;

  constructor(tokenVar: string = 'SLURM_JWT') {
    this.tokenVar = tokenVar;
  }

  async getToken(): Promise<SecretString> {
    const token = process.env[this.tokenVar];
    if (!token) {
      throw SlurmError.configuration(`Environment variable ${this.tokenVar} not set`);
    }
    return new SecretString(token);
  }
}

/**
 * Builds the authentication headers sent with every request.
 */
export async function buildAuthHeaders(
  provider: TokenProvider | undefined,
  userName?: string
): Promise<Record<string, string>> {
  const headers: Record<string, string> = {};
  if (provider) {
    const token = (await provider.getToken()).expose();
    headers['Authorization'] = `Bearer ${token}`;
    headers['X-SLURM-USER-TOKEN'] = token;
  }
  if (userName) {
    headers['X-SLURM-USER-NAME'] = userName;
  }
  return headers;
}
