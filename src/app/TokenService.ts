import { UsageError } from "../domain/errors";
import type { LoggerPort } from "../ports/sys/LoggerPort";
import type { TokenPort } from "../ports/worklog/TokenPort";

/** Admin-only lookup of a personal API token for another user. */
export class TokenService {
  constructor(
    private readonly tokens: TokenPort,
    private readonly logger: LoggerPort
  ) {}

  async fetchToken(email: string): Promise<string> {
    const trimmed = email.trim();
    if (!trimmed) {
      throw new UsageError("Provide the user's email with -e to look up a token.");
    }
    this.logger.debug("Requesting API token", { email: trimmed });
    return this.tokens.fetchToken(trimmed);
  }
}
