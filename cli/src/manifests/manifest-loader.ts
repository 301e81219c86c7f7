import * as fs from "fs";
import * as path from "path";
import yaml from "js-yaml";
import { z } from "zod";
import { AppError } from "../errors/app-error";

const manifestSchema = z.object({
  apiVersion: z.string().min(1),
  kind: z.string().min(1),
  metadata: z.object({
    name: z.string().min(1),
    namespace: z.string().min(1).optional(),
  }),
  spec: z.record(z.unknown()).optional(),
});

const serviceSpecSchema = z.object({
  type: z
    .enum(["ClusterIP", "NodePort", "LoadBalancer", "ExternalName"])
    .default("ClusterIP"),
  ports: z
    .array(
      z.object({
        port: z.number().int().positive(),
        nodePort: z.number().int().positive().optional(),
        protocol: z.enum(["TCP", "UDP", "SCTP"]).default("TCP"),
      })
    )
    .default([]),
});

export type ServiceType = z.infer<typeof serviceSpecSchema>["type"];

export interface ManifestSummary {
  file: string;
  kind: string;
  name: string;
  namespace?: string;
}

export interface ServiceManifestSummary extends ManifestSummary {
  serviceType: ServiceType;
  /** First declared service port; 80 when none is declared. */
  port: number;
  nodePort?: number;
  protocol: string;
}

export interface Scenario {
  name: string;
  dir: string;
  deployment: ManifestSummary;
  service: ServiceManifestSummary;
}

const DEPLOYMENT_FILE = "deployment.yaml";
const SERVICE_FILE = "service.yaml";

const formatIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");

const parseDocument = (file: string): z.infer<typeof manifestSchema> => {
  if (!fs.existsSync(file)) {
    throw new AppError(`Manifest not found: ${file}`, "invalid-input");
  }

  let doc: unknown;
  try {
    doc = yaml.load(fs.readFileSync(file, "utf8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new AppError(`Manifest ${file} is not valid YAML: ${reason}`, "invalid-input");
  }

  const parsed = manifestSchema.safeParse(doc);
  if (!parsed.success) {
    throw new AppError(
      `Manifest ${file} is not a Kubernetes object: ${formatIssues(parsed.error)}`,
      "invalid-input"
    );
  }
  return parsed.data;
};

export const loadManifest = (file: string): ManifestSummary => {
  const doc = parseDocument(file);
  return {
    file,
    kind: doc.kind,
    name: doc.metadata.name,
    namespace: doc.metadata.namespace,
  };
};

const expectKind = (summary: ManifestSummary, kind: string): void => {
  if (summary.kind !== kind) {
    throw new AppError(
      `Expected ${summary.file} to describe a ${kind}, found ${summary.kind}`,
      "invalid-input"
    );
  }
};

export const loadServiceManifest = (file: string): ServiceManifestSummary => {
  const doc = parseDocument(file);
  const summary: ManifestSummary = {
    file,
    kind: doc.kind,
    name: doc.metadata.name,
    namespace: doc.metadata.namespace,
  };
  expectKind(summary, "Service");

  const spec = serviceSpecSchema.safeParse(doc.spec ?? {});
  if (!spec.success) {
    throw new AppError(
      `Service ${file} has an invalid spec: ${formatIssues(spec.error)}`,
      "invalid-input"
    );
  }

  const [first] = spec.data.ports;
  return {
    ...summary,
    serviceType: spec.data.type,
    port: first?.port ?? 80,
    nodePort: first?.nodePort,
    protocol: first?.protocol ?? "TCP",
  };
};

/**
 * Loads `<rootDir>/<name>/deployment.yaml` and `service.yaml`.
 */
export const loadScenario = (rootDir: string, name: string): Scenario => {
  const dir = path.resolve(rootDir, name);
  if (!fs.existsSync(dir)) {
    throw new AppError(`Unknown scenario "${name}" (looked in ${dir})`, "invalid-input");
  }

  const deployment = loadManifest(path.join(dir, DEPLOYMENT_FILE));
  expectKind(deployment, "Deployment");

  const service = loadServiceManifest(path.join(dir, SERVICE_FILE));

  return { name, dir, deployment, service };
};
