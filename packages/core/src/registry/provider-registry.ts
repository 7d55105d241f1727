// Provider registry — allowlist of credential providers, loaded from a JSON
// file with a built-in fallback.
//
// File format:
//   { "providers": ["trusted_bank_001", { "id": "licensed_lender_005" }] }

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { BUILTIN_PROVIDERS } from '../constants.js';
import { defaultLogger } from '../logger.js';
import type { Logger } from '../types/index.js';

const providerEntry = z.union([
  z.string().trim().min(1),
  z.object({ id: z.string().trim().min(1) }).passthrough().transform((p) => p.id),
]);

const registryFileSchema = z.object({
  providers: z.array(providerEntry),
});

export interface ProviderRegistryOptions {
  /** JSON allowlist. Ignored when `providers` is given. */
  configPath?: string;
  /** Explicit allowlist — skips the file entirely */
  providers?: readonly string[];
  logger?: Logger;
}

export interface ProviderDecision {
  provider_id: string;
  allowed: boolean;
  reason: string;
}

export interface RegistryStats {
  total_providers: number;
  allowlist_size: number;
  source: 'explicit' | 'file' | 'builtin';
  config_path: string | null;
}

export class ProviderRegistry {
  private providers = new Set<string>();
  private source: RegistryStats['source'] = 'builtin';
  private readonly configPath: string | null;
  private readonly explicit: readonly string[] | null;
  private readonly logger: Logger;

  constructor(options: ProviderRegistryOptions = {}) {
    this.configPath = options.configPath ?? null;
    this.explicit = options.providers ?? null;
    this.logger = options.logger ?? defaultLogger;
    this.load();
  }

  /** Trimmed, case-sensitive lookup. Blank ids are never allowed. */
  isAllowed(providerId: string): boolean {
    const id = providerId.trim();
    return id.length > 0 && this.providers.has(id);
  }

  /** `isAllowed` with the trimmed id and a reviewer-facing reason. */
  check(providerId: string): ProviderDecision {
    const id = providerId.trim();
    const allowed = this.isAllowed(id);
    return {
      provider_id: id,
      allowed,
      reason: allowed ? 'Provider is in trust registry' : 'Provider not found in trust registry',
    };
  }

  listProviders(): string[] {
    return [...this.providers].sort();
  }

  /** False when the id is blank or already present. */
  addProvider(providerId: string): boolean {
    const id = providerId.trim();
    if (!id || this.providers.has(id)) return false;
    this.providers.add(id);
    return true;
  }

  removeProvider(providerId: string): boolean {
    return this.providers.delete(providerId.trim());
  }

  /** Re-read the allowlist from its source, discarding runtime additions. */
  reload(): void {
    this.load();
  }

  stats(): RegistryStats {
    return {
      total_providers: this.providers.size,
      allowlist_size: this.providers.size,
      source: this.source,
      config_path: this.configPath,
    };
  }

  // ── Loading ────────────────────────────────────────────────────────────────

  private load(): void {
    if (this.explicit) {
      this.providers = new Set(this.explicit.map((p) => p.trim()).filter(Boolean));
      this.source = 'explicit';
      return;
    }

    if (this.configPath) {
      try {
        this.providers = this.readFile(this.configPath);
        this.source = 'file';
        this.logger.info(`provider registry loaded ${this.providers.size} providers from ${this.configPath}`);
        return;
      } catch (err) {
        const msg = err instanceof Error ? err.message : String(err);
        this.logger.warn(`failed to load provider registry from ${this.configPath}: ${msg}; using built-in allowlist`);
      }
    }

    this.providers = new Set<string>(BUILTIN_PROVIDERS);
    this.source = 'builtin';
  }

  private readFile(path: string): Set<string> {
    const raw: unknown = JSON.parse(readFileSync(path, 'utf8'));
    const parsed = registryFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? issue.path.join('.') : 'root';
      throw new Error(`invalid registry file at ${where}: ${issue?.message ?? 'unknown issue'}`);
    }
    return new Set(parsed.data.providers);
  }
}
