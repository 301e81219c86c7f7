import { AppError } from "../errors/app-error";
import { Scenario } from "../manifests/manifest-loader";
import { FakeCommandRunner } from "../testing/fake-command-runner";
import { logger } from "../utils/logger";
import { KubectlService } from "./kubectl.service";
import { MinikubeService } from "./minikube.service";
import { renderGuide, ReproductionService } from "./reproduction.service";

const scenario: Scenario = {
  name: "external-ip-pending",
  dir: "/lab/external-ip-pending",
  deployment: {
    file: "/lab/external-ip-pending/deployment.yaml",
    kind: "Deployment",
    name: "deployment-example",
  },
  service: {
    file: "/lab/external-ip-pending/service.yaml",
    kind: "Service",
    name: "nginx-ils-service",
    serviceType: "LoadBalancer",
    port: 80,
    nodePort: 30062,
    protocol: "TCP",
  },
};

const options = { driver: "docker", waitTimeout: "300s" };

describe("ReproductionService", () => {
  let runner: FakeCommandRunner;
  let service: ReproductionService;

  beforeEach(() => {
    runner = new FakeCommandRunner();
    service = new ReproductionService(
      new MinikubeService(runner),
      new KubectlService(runner)
    );
  });

  it("runs the setup sequence in order", async () => {
    await service.reproduce(scenario, options);

    expect(runner.commands).toEqual([
      "minikube version",
      "kubectl version --client",
      "minikube start --driver=docker",
      "kubectl wait --for=condition=Ready nodes --all --timeout=300s",
      "kubectl apply -f /lab/external-ip-pending/deployment.yaml",
      "kubectl wait --for=condition=Available deployment/deployment-example --timeout=300s",
      "kubectl apply -f /lab/external-ip-pending/service.yaml",
    ]);
  });

  it("shows each tool's output at info level", async () => {
    const info = jest.spyOn(logger, "info").mockImplementation(() => undefined);
    runner.respond("minikube start", { stdout: "🏄  Done! kubectl is now configured\n" });

    try {
      await service.reproduce(scenario, options);
      expect(info).toHaveBeenCalledWith("🏄  Done! kubectl is now configured");
    } finally {
      info.mockRestore();
    }
  });

  it("passes the driver and wait timeout through", async () => {
    await service.reproduce(scenario, { driver: "podman", waitTimeout: "5m" });

    expect(runner.commands).toContain("minikube start --driver=podman");
    expect(runner.commands).toContain(
      "kubectl wait --for=condition=Ready nodes --all --timeout=5m"
    );
  });

  it("fails fast when minikube is not installed", async () => {
    runner.respond("minikube version", { returncode: -1, spawnError: "ENOENT" });

    await expect(service.reproduce(scenario, options)).rejects.toMatchObject({
      kind: "tool-missing",
      exitCode: 1,
      message: "minikube is not installed. Please install minikube first.",
    });
    expect(runner.commands).toEqual(["minikube version"]);
  });

  it("fails fast when kubectl is not installed", async () => {
    runner.respond("kubectl version", { returncode: -1, spawnError: "ENOENT" });

    await expect(service.reproduce(scenario, options)).rejects.toMatchObject({
      kind: "tool-missing",
      message: "kubectl is not installed. Please install kubectl first.",
    });
    expect(runner.commands).toEqual(["minikube version", "kubectl version --client"]);
  });

  it("treats a probe that exits non-zero as installed", async () => {
    runner.respond("kubectl version", { returncode: 1, stderr: "no config" });

    await service.reproduce(scenario, options);

    expect(runner.commands).toHaveLength(7);
  });

  it("stops at the first failing tool and propagates its exit status", async () => {
    runner.respond("minikube start", { returncode: 80, stderr: "Exiting due to DRV_NOT_HEALTHY\n" });

    const error = await service.reproduce(scenario, options).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(AppError);
    expect(error).toMatchObject({
      kind: "tool-failed",
      exitCode: 80,
      message: '"minikube start --driver=docker" exited with status 80: Exiting due to DRV_NOT_HEALTHY',
    });
    expect(runner.commands).toEqual([
      "minikube version",
      "kubectl version --client",
      "minikube start --driver=docker",
    ]);
  });

  it("does not apply the service when the deployment never becomes available", async () => {
    runner.respond("kubectl wait --for=condition=Available", {
      returncode: 1,
      stderr: "error: timed out waiting for the condition on deployments/deployment-example",
    });

    await expect(service.reproduce(scenario, options)).rejects.toMatchObject({
      kind: "tool-failed",
      exitCode: 1,
    });
    expect(runner.commands).not.toContain("kubectl apply -f /lab/external-ip-pending/service.yaml");
  });

  it("tears the scenario down, and the cluster when asked", async () => {
    await service.teardown(scenario, { deleteCluster: true });

    expect(runner.commands).toEqual([
      "minikube version",
      "kubectl version --client",
      "kubectl delete -f /lab/external-ip-pending/service.yaml --ignore-not-found",
      "kubectl delete -f /lab/external-ip-pending/deployment.yaml --ignore-not-found",
      "minikube delete",
    ]);
  });

  it("keeps the cluster by default on teardown", async () => {
    await service.teardown(scenario, { deleteCluster: false });

    expect(runner.commands).not.toContain("minikube delete");
  });

  it("uses configured binary names", async () => {
    const custom = new ReproductionService(
      new MinikubeService(runner, "/opt/bin/minikube"),
      new KubectlService(runner, "/opt/bin/kubectl")
    );

    await custom.ensureTools();

    expect(runner.commands).toEqual(["/opt/bin/minikube version", "/opt/bin/kubectl version --client"]);
  });
});

describe("renderGuide", () => {
  it("shows how to observe the pending external IP", () => {
    const lines = renderGuide(scenario);

    expect(lines.slice(0, 10)).toEqual([
      "",
      "Setup complete! The issue should now be visible.",
      "",
      "To see the pending external IP, run:",
      "kubectl get svc nginx-ils-service",
      "",
      "Expected output:",
      "NAME                TYPE           CLUSTER-IP   EXTERNAL-IP   PORT(S)        AGE",
      "nginx-ils-service   LoadBalancer   10.x.x.x     <pending>     80:30062/TCP   Xs",
      "",
    ]);
  });

  it("lists the workarounds for the scenario's service", () => {
    const lines = renderGuide(scenario);

    expect(lines).toContain("   $ minikube service nginx-ils-service --url");
    expect(lines).toContain("   $ minikube tunnel");
  });

  it("adds the namespace to the kubectl command when the service declares one", () => {
    const lines = renderGuide({
      ...scenario,
      service: { ...scenario.service, namespace: "lab" },
    });

    expect(lines[4]).toBe("kubectl get svc nginx-ils-service -n lab");
  });
});
