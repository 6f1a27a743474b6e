import * as fs from 'fs';
import path from 'path';
import { CredentialRecord } from '../models/Credentials';

/** Credentials are refreshed this long before their nominal expiry. */
export const EXPIRY_MARGIN_MS = 5 * 60 * 1000;

/**
 * Where the single OAuth credential record lives.
 *
 * Single-writer contract: the bot is single-tenant and nothing coordinates
 * concurrent authorization attempts, so the last `save()` wins.
 */
export interface CredentialStore {
  load(): Promise<CredentialRecord | null>;
  save(record: CredentialRecord): Promise<void>;
}

function isCredentialRecord(value: unknown): value is CredentialRecord {
  if (typeof value !== 'object' || value == null) return false;
  return (
    'access_token' in value &&
    typeof value.access_token === 'string' &&
    'expiry' in value &&
    typeof value.expiry === 'string' &&
    (!('refresh_token' in value) || value.refresh_token === undefined || typeof value.refresh_token === 'string')
  );
}

export function isExpired(record: CredentialRecord, now = Date.now()): boolean {
  const expiry = Date.parse(record.expiry);
  return Number.isNaN(expiry) || now >= expiry - EXPIRY_MARGIN_MS;
}

/** JSON file on disk; absence of the file means "never authenticated". */
export class FileCredentialStore implements CredentialStore {
  constructor(private readonly filePath: string) {}

  async load(): Promise<CredentialRecord | null> {
    let content: string;
    try {
      content = await fs.promises.readFile(this.filePath, 'utf8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null;
      throw err;
    }

    try {
      const parsed: unknown = JSON.parse(content);
      if (isCredentialRecord(parsed)) {
        return {
          ...parsed,
          scope: typeof parsed.scope === 'string' ? parsed.scope : '',
          token_type: typeof parsed.token_type === 'string' ? parsed.token_type : 'Bearer',
        };
      }
    } catch (err) {
      console.warn(`[credentialStore] ${this.filePath} is not valid JSON`, err);
      return null;
    }
    console.warn(`[credentialStore] ${this.filePath} does not hold a credential record`);
    return null;
  }

  async save(record: CredentialRecord): Promise<void> {
    await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.promises.writeFile(this.filePath, JSON.stringify(record, null, 2), { mode: 0o600 });
    // writeFile only applies `mode` when it creates the file
    await fs.promises.chmod(this.filePath, 0o600);
  }
}
