import { ConfigurationError, RemoteSubmissionError } from "../../domain/errors";
import type { TokenPort } from "../../ports/worklog/TokenPort";
import { describeError, joinUrl } from "./url";

export interface HttpTokenOptions {
  apiUrl?: string;
  functionKey?: string;
  tokenPath: string;
}

export class HttpTokenClient implements TokenPort {
  constructor(private readonly options: HttpTokenOptions) {}

  async fetchToken(email: string): Promise<string> {
    const { apiUrl, functionKey, tokenPath } = this.options;
    if (!apiUrl || !functionKey) {
      throw new ConfigurationError(
        "Please set WORKLOG_API_URL and WORKLOG_TOKEN_FUNCTION_KEY to use this feature."
      );
    }

    const url = new URL(joinUrl(apiUrl, tokenPath));
    url.searchParams.set("email", email);

    let res: Response;
    let body: string;
    try {
      res = await fetch(url.toString(), {
        headers: { "x-functions-key": functionKey },
      });
      body = await res.text();
    } catch (err) {
      throw new RemoteSubmissionError(`Failed to reach the token API: ${describeError(err)}`, undefined, { cause: err });
    }

    if (!res.ok) {
      throw new RemoteSubmissionError(`Failed to get token. The API returned status ${res.status}.`, res.status);
    }
    return body.trim();
  }
}
