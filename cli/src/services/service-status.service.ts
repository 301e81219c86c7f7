import { setTimeout as delay } from "timers/promises";
import { HttpError, V1Service } from "@kubernetes/client-node";
import { AppError } from "../errors/app-error";
import { logger } from "../utils/logger";
import { formatTable } from "../utils/table";
import { SERVICE_TABLE_HEADER } from "./reproduction.service";

/** The slice of CoreV1Api this service needs. */
export interface ServiceReader {
  readNamespacedService(name: string, namespace: string): Promise<{ body: V1Service }>;
}

export interface ServiceStatus {
  name: string;
  namespace: string;
  type: string;
  clusterIP: string;
  externalIP: string;
  ports: string;
  age: string;
  pending: boolean;
}

export interface WaitOptions {
  timeoutMs: number;
  intervalMs: number;
}

export const PENDING = "<pending>";
const NONE = "<none>";

/**
 * Short age in the style of `kubectl get`: 45s, 3m20s, 40m, 5h12m, 30h, 3d4h, 12d.
 */
export const formatAge = (seconds: number): string => {
  if (seconds < 0) return "<invalid>";
  const s = Math.floor(seconds);
  const m = Math.floor(s / 60);
  const h = Math.floor(m / 60);
  const d = Math.floor(h / 24);

  if (s < 120) return `${s}s`;
  if (m < 10) return s % 60 === 0 ? `${m}m` : `${m}m${s % 60}s`;
  if (m < 180) return `${m}m`;
  if (h < 8) return m % 60 === 0 ? `${h}h` : `${h}h${m % 60}m`;
  if (h < 48) return `${h}h`;
  if (d < 8) return h % 24 === 0 ? `${d}d` : `${d}d${h % 24}h`;
  return `${d}d`;
};

const externalIpOf = (svc: V1Service): string => {
  const type = svc.spec?.type ?? "ClusterIP";

  if (type === "LoadBalancer") {
    const addresses = (svc.status?.loadBalancer?.ingress ?? [])
      .map((ingress) => ingress.ip ?? ingress.hostname)
      .filter((address): address is string => Boolean(address));
    const external = svc.spec?.externalIPs ?? [];
    const all = [...addresses, ...external];
    return all.length > 0 ? all.join(",") : PENDING;
  }

  if (type === "ExternalName") return svc.spec?.externalName ?? NONE;

  const external = svc.spec?.externalIPs ?? [];
  return external.length > 0 ? external.join(",") : NONE;
};

const portsOf = (svc: V1Service): string => {
  const ports = svc.spec?.ports ?? [];
  if (ports.length === 0) return NONE;
  return ports
    .map((p) => {
      const protocol = p.protocol ?? "TCP";
      return p.nodePort ? `${p.port}:${p.nodePort}/${protocol}` : `${p.port}/${protocol}`;
    })
    .join(",");
};

export const toServiceStatus = (
  svc: V1Service,
  fallbackName: string,
  fallbackNamespace: string,
  now: Date
): ServiceStatus => {
  const created = svc.metadata?.creationTimestamp;
  const externalIP = externalIpOf(svc);

  return {
    name: svc.metadata?.name ?? fallbackName,
    namespace: svc.metadata?.namespace ?? fallbackNamespace,
    type: svc.spec?.type ?? "ClusterIP",
    clusterIP: svc.spec?.clusterIP ?? NONE,
    externalIP,
    ports: portsOf(svc),
    age: created ? formatAge((now.getTime() - new Date(created).getTime()) / 1000) : "<unknown>",
    pending: externalIP === PENDING,
  };
};

export const renderServiceStatus = (status: ServiceStatus): string[] =>
  formatTable([
    SERVICE_TABLE_HEADER,
    [status.name, status.type, status.clusterIP, status.externalIP, status.ports, status.age],
  ]);

export class ServiceStatusService {
  private readonly now: () => Date;
  private readonly sleep: (ms: number) => Promise<unknown>;

  constructor(
    private readonly reader: ServiceReader,
    options: { now?: () => Date; sleep?: (ms: number) => Promise<unknown> } = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.sleep = options.sleep ?? ((ms) => delay(ms));
  }

  /**
   * Reads the service the way `kubectl get svc <name>` shows it.
   */
  async describe(name: string, namespace: string): Promise<ServiceStatus> {
    try {
      const { body } = await this.reader.readNamespacedService(name, namespace);
      return toServiceStatus(body, name, namespace, this.now());
    } catch (err) {
      if (err instanceof HttpError && err.statusCode === 404) {
        throw new AppError(
          `Service ${name} not found in namespace ${namespace}`,
          "not-found",
          1,
          { name, namespace }
        );
      }
      throw err;
    }
  }

  /**
   * Polls until the service has an external address, e.g. once
   * `minikube tunnel` is running.
   */
  async waitForExternalIp(
    name: string,
    namespace: string,
    { timeoutMs, intervalMs }: WaitOptions
  ): Promise<ServiceStatus> {
    const deadline = this.now().getTime() + timeoutMs;

    for (;;) {
      const status = await this.describe(name, namespace);
      if (!status.pending) {
        logger.info({ name, externalIP: status.externalIP }, "✅ External IP assigned");
        return status;
      }

      if (this.now().getTime() >= deadline) {
        throw new AppError(
          `External IP of ${name} still ${PENDING} after ${timeoutMs}ms`,
          "timeout",
          1,
          { name, namespace }
        );
      }

      logger.info({ name }, `⏳ External IP still ${PENDING}`);
      await this.sleep(intervalMs);
    }
  }
}
