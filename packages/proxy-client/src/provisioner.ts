// Credential provisioning
// Every attempt asks the proxy for a fresh short-lived credential; nothing is cached

import { createLogger, createTimeoutController, type Logger } from "@keyrelay/kernel";
import {
  ProxyUnavailableError,
  err,
  ok,
  type Capability,
  type Credential,
  type Result,
} from "@keyrelay/shared";
import { ProvisionResponseSchema, type FetchFn, type ProxyClientOptions } from "./types.js";

/** Join a base URL and a path without doubling slashes */
export function joinUrl(baseUrl: string, path: string): string {
  return `${baseUrl.replace(/\/+$/, "")}/${path.replace(/^\/+/, "")}`;
}

export class CredentialProvisioner {
  private readonly fetchFn: FetchFn;
  private readonly log: Logger;

  constructor(private readonly options: ProxyClientOptions) {
    this.fetchFn = options.fetch ?? fetch;
    this.log = options.logger ?? createLogger({ name: "provisioner" });
  }

  /**
   * Obtain a credential for one call attempt.
   * Network errors, timeouts, non-2xx responses and malformed bodies all
   * come back as `ProxyUnavailableError`. No retry happens here.
   */
  async provision(
    capability: Capability,
    signal?: AbortSignal,
  ): Promise<Result<Credential, ProxyUnavailableError>> {
    const url = joinUrl(
      this.options.baseUrl,
      `keys/provision/${encodeURIComponent(this.options.service)}?capability=${encodeURIComponent(capability)}`,
    );
    const timeout = createTimeoutController(this.options.timeoutMs, signal);

    try {
      let response: Response;
      try {
        response = await this.fetchFn(url, {
          method: "GET",
          headers: {
            Authorization: `Bearer ${this.options.apiKey}`,
            Accept: "application/json",
          },
          signal: timeout.signal,
        });
      } catch (error) {
        const message = timeout.timedOut()
          ? `Proxy did not respond within ${this.options.timeoutMs}ms`
          : `Proxy request failed: ${error instanceof Error ? error.message : String(error)}`;
        this.log.warn("Credential provisioning failed", { capability, error: message });
        return err(new ProxyUnavailableError(message));
      }

      if (!response.ok) {
        this.log.warn("Proxy rejected provisioning request", {
          capability,
          status: response.status,
        });
        return err(
          new ProxyUnavailableError(`Proxy returned HTTP ${response.status}`, response.status),
        );
      }

      let body: unknown;
      try {
        body = await response.json();
      } catch (error) {
        this.log.warn("Provisioning response is not JSON", { capability, error: String(error) });
        return err(new ProxyUnavailableError("Malformed provisioning response", response.status));
      }

      const parsed = ProvisionResponseSchema.safeParse(body);
      if (!parsed.success) {
        this.log.warn("Provisioning response failed validation", {
          capability,
          issues: parsed.error.issues.map((issue) => issue.path.join(".")),
        });
        return err(new ProxyUnavailableError("Malformed provisioning response", response.status));
      }

      this.log.debug("Credential provisioned", { capability, credentialId: parsed.data.token_id });
      return ok({ id: parsed.data.token_id, value: parsed.data.token });
    } finally {
      timeout.cleanup();
    }
  }
}
