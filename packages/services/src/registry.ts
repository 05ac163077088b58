import { createChildLogger, errorMessage } from "@notes-to-blog/core";
import { CapabilityCallError } from "./errors.js";
import { withDeadline } from "./retry.js";
import type {
  ImageClient,
  LlmClient,
  SearchClient,
  ServiceState,
} from "./types.js";

const logger = createChildLogger({ module: "services:registry" });

export type CapabilityName = "llm" | "search" | "image";

export const CAPABILITY_NAMES: readonly CapabilityName[] = ["llm", "search", "image"];

export interface CapabilityClients {
  llm: LlmClient;
  search: SearchClient;
  image: ImageClient;
}

export interface ServiceStatus {
  name: CapabilityName;
  state: ServiceState;
  lastCheckedAt: string;
  detail?: string;
}

export interface ServiceRegistryOptions {
  healthCheckTimeoutMs?: number;
  now?: () => Date;
}

/**
 * Owns one client per capability and a lazily computed health status for each.
 * A status is checked on first request and reused until invalidated.
 */
export class ServiceRegistry {
  private readonly statuses = new Map<CapabilityName, ServiceStatus>();
  private readonly inflight = new Map<CapabilityName, Promise<ServiceStatus>>();
  private readonly healthCheckTimeoutMs: number;
  private readonly now: () => Date;

  constructor(
    private readonly clients: CapabilityClients,
    options: ServiceRegistryOptions = {}
  ) {
    this.healthCheckTimeoutMs = options.healthCheckTimeoutMs ?? 15_000;
    this.now = options.now ?? (() => new Date());
  }

  get<K extends CapabilityName>(name: K): CapabilityClients[K] {
    return this.clients[name];
  }

  async status(name: CapabilityName): Promise<ServiceStatus> {
    const cached = this.statuses.get(name);
    if (cached) return cached;

    // Concurrent callers share one health check
    const pending = this.inflight.get(name);
    if (pending) return pending;

    const check = this.check(name).finally(() => this.inflight.delete(name));
    this.inflight.set(name, check);
    return check;
  }

  async statusAll(): Promise<ServiceStatus[]> {
    return Promise.all(CAPABILITY_NAMES.map((name) => this.status(name)));
  }

  /** Last known status without triggering a check. */
  peek(name: CapabilityName): ServiceStatus | undefined {
    return this.statuses.get(name);
  }

  markStatus(name: CapabilityName, state: ServiceState, detail?: string): ServiceStatus {
    const status = this.record(name, state, detail);
    logger.info({ capability: name, state, detail }, "Capability status set manually");
    return status;
  }

  invalidate(name?: CapabilityName): void {
    if (name) {
      this.statuses.delete(name);
    } else {
      this.statuses.clear();
    }
  }

  private async check(name: CapabilityName): Promise<ServiceStatus> {
    const client = this.clients[name];
    let status: ServiceStatus;

    try {
      const report = await withDeadline(
        client.healthCheck(),
        this.healthCheckTimeoutMs,
        () => new CapabilityCallError("timeout", `${name} health check timed out`)
      );
      status = this.record(name, report.state, report.detail);
    } catch (err) {
      status = this.record(name, "unavailable", errorMessage(err));
    }

    const context = { capability: name, provider: client.provider, state: status.state, detail: status.detail };
    if (status.state === "available") {
      logger.info(context, "Capability health checked");
    } else {
      logger.warn(context, "Capability health check reported a problem");
    }
    return status;
  }

  private record(name: CapabilityName, state: ServiceState, detail?: string): ServiceStatus {
    const status: ServiceStatus = {
      name,
      state,
      lastCheckedAt: this.now().toISOString(),
      ...(detail ? { detail } : {}),
    };
    this.statuses.set(name, status);
    return status;
  }
}
