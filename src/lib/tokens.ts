import { nanoid } from 'nanoid';

export const DEFAULT_TOKEN_TTL_MS = 12 * 60 * 60 * 1000;

type Grant = { username: string; expires: number };

/**
 * Opaque login tokens. Process-local: a restart logs everyone out.
 * Each use pushes the expiry out by `ttlMs`; idle tokens lapse.
 */
export class TokenRegistry {
  private readonly grants = new Map<string, Grant>();

  constructor(
    private readonly ttlMs = DEFAULT_TOKEN_TTL_MS,
    private readonly now: () => number = Date.now,
  ) {}

  issue(username: string): string {
    this.sweep();
    const token = nanoid(32);
    this.grants.set(token, { username, expires: this.now() + this.ttlMs });
    return token;
  }

  resolve(token: string | undefined): string | undefined {
    if (!token) return undefined;
    const grant = this.grants.get(token);
    if (!grant) return undefined;
    if (grant.expires <= this.now()) {
      this.grants.delete(token);
      return undefined;
    }
    grant.expires = this.now() + this.ttlMs;
    return grant.username;
  }

  revoke(token: string): string | undefined {
    const grant = this.grants.get(token);
    this.grants.delete(token);
    return grant?.username;
  }

  get size(): number {
    return this.grants.size;
  }

  private sweep() {
    const now = this.now();
    for (const [token, grant] of this.grants) {
      if (grant.expires <= now) this.grants.delete(token);
    }
  }
}
