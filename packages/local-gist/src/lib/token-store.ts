import Conf from "conf";

export interface StoredCredentials {
  token?: string;
  /** When the token was saved, ISO 8601 */
  savedAt?: string;
}

export interface TokenStore {
  getCredentials(): StoredCredentials;
  setToken(token: string): void;
  clear(): void;
}

export class ConfTokenStore implements TokenStore {
  private readonly conf = new Conf<StoredCredentials>({ projectName: "local-gist" });

  getCredentials(): StoredCredentials {
    return {
      token: this.conf.get("token"),
      savedAt: this.conf.get("savedAt"),
    };
  }

  setToken(token: string): void {
    const trimmed = token.trim();
    if (!trimmed) {
      throw new Error("Refusing to store an empty token.");
    }
    this.conf.set({ token: trimmed, savedAt: new Date().toISOString() });
  }

  clear(): void {
    this.conf.clear();
  }
}

export type TokenSource = "env" | "store" | "none";

/**
 * Pick the token to send: `GITHUB_TOKEN` wins over the stored one.
 */
export function resolveToken(
  store: Pick<TokenStore, "getCredentials">,
  env: NodeJS.ProcessEnv = process.env
): { token?: string; source: TokenSource } {
  const fromEnv = env.GITHUB_TOKEN?.trim();
  if (fromEnv) return { token: fromEnv, source: "env" };

  const stored = store.getCredentials().token;
  if (stored) return { token: stored, source: "store" };

  return { source: "none" };
}
