import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { execa } from "execa";
import { z } from "zod";

import { actionableFor, UsageError } from "../errors.js";
import type { Logger } from "../log.js";
import { silentLogger } from "../log.js";
import type { CredentialSource } from "./provider.js";

const KEYCHAIN_SERVICE = "Claude Code-credentials";

const StoredCredentialsSchema = z.object({
  claudeAiOauth: z.object({
    accessToken: z.string().min(1),
  }),
});

export type KeychainReader = () => Promise<string | null>;

export type ClaudeCredentialOptions = {
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
  credentialsPath?: string;
  readKeychain?: KeychainReader;
  logger?: Logger;
};

export function defaultCredentialsPath(): string {
  return path.join(os.homedir(), ".claude", ".credentials.json");
}

export function parseStoredCredentials(raw: string): string | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = StoredCredentialsSchema.safeParse(json);
  return parsed.success ? parsed.data.claudeAiOauth.accessToken : null;
}

export const KEYCHAIN_TIMEOUT_MS = 5_000;

export type SecurityRunner = (
  file: string,
  args: string[],
  opts: { timeout: number }
) => Promise<{ stdout: string }>;

export async function readMacKeychain(
  run: SecurityRunner = (file, args, opts) => execa(file, args, opts)
): Promise<string | null> {
  const { stdout } = await run(
    "security",
    ["find-generic-password", "-s", KEYCHAIN_SERVICE, "-a", os.userInfo().username, "-w"],
    { timeout: KEYCHAIN_TIMEOUT_MS }
  );
  if (!stdout.trim()) return null;
  return parseStoredCredentials(stdout.trim());
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Resolves the OAuth token Claude Code stored at login: env override,
 * then the macOS keychain, then ~/.claude/.credentials.json.
 */
export class ClaudeCredentialSource implements CredentialSource {
  private cachedToken: string | null = null;
  private readonly env: NodeJS.ProcessEnv;
  private readonly platform: NodeJS.Platform;
  private readonly credentialsPath: string;
  private readonly readKeychain: KeychainReader;
  private readonly logger: Logger;

  constructor(opts: ClaudeCredentialOptions = {}) {
    this.env = opts.env ?? process.env;
    this.platform = opts.platform ?? process.platform;
    this.credentialsPath = opts.credentialsPath ?? defaultCredentialsPath();
    this.readKeychain = opts.readKeychain ?? (() => readMacKeychain());
    this.logger = opts.logger ?? silentLogger;
  }

  async getToken(): Promise<string> {
    if (this.cachedToken) return this.cachedToken;

    const envToken = this.env.CLAUDE_CODE_OAUTH_TOKEN?.trim();
    if (envToken) {
      this.cachedToken = envToken;
      return envToken;
    }

    if (this.platform === "darwin") {
      try {
        const token = await this.readKeychain();
        if (token) {
          this.cachedToken = token;
          return token;
        }
      } catch (err) {
        const msg = err instanceof Error ? err.message : String(err);
        this.logger.debug(`keychain lookup failed: ${msg}`);
      }
    }

    try {
      const raw = await fs.readFile(this.credentialsPath, "utf8");
      const token = parseStoredCredentials(raw);
      if (token) {
        this.cachedToken = token;
        return token;
      }
      this.logger.debug(`no access token in ${this.credentialsPath}`);
    } catch (err) {
      if (!isMissingFile(err)) {
        const msg = err instanceof Error ? err.message : String(err);
        this.logger.debug(`reading ${this.credentialsPath} failed: ${msg}`);
      }
    }

    throw new UsageError(
      "not-authenticated",
      "no Claude Code OAuth token found",
      actionableFor("not-authenticated")
    );
  }

  invalidate(): void {
    this.cachedToken = null;
  }
}
