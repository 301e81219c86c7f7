import { IncomingMessage } from "http";
import { Socket } from "net";
import { HttpError, V1Service } from "@kubernetes/client-node";
import {
  formatAge,
  renderServiceStatus,
  ServiceReader,
  ServiceStatusService,
} from "./service-status.service";

const created = new Date("2026-01-01T00:00:00.000Z");
const fortyTwoSecondsLater = () => new Date("2026-01-01T00:00:42.000Z");

const loadBalancer = (ingress: { ip?: string; hostname?: string }[] = []): V1Service => ({
  metadata: { name: "nginx-ils-service", namespace: "default", creationTimestamp: created },
  spec: {
    type: "LoadBalancer",
    clusterIP: "10.96.12.34",
    ports: [{ port: 80, nodePort: 30062, protocol: "TCP" }],
  },
  status: { loadBalancer: { ingress } },
});

/** Answers with the given services in turn, repeating the last one. */
const readerOf = (...services: V1Service[]) => {
  let calls = 0;
  const reader: ServiceReader = {
    readNamespacedService: async () => {
      const body = services[Math.min(calls, services.length - 1)];
      calls += 1;
      return { body };
    },
  };
  return { reader, calls: () => calls };
};

describe("formatAge", () => {
  it.each([
    [45, "45s"],
    [200, "3m20s"],
    [2400, "40m"],
    [18720, "5h12m"],
    [108000, "30h"],
    [273600, "3d4h"],
    [1036800, "12d"],
    [-5, "<invalid>"],
  ])("formats %d seconds as %s", (seconds, expected) => {
    expect(formatAge(seconds)).toBe(expected);
  });
});

describe("ServiceStatusService.describe", () => {
  it("shows <pending> for a LoadBalancer without ingress", async () => {
    const service = new ServiceStatusService(readerOf(loadBalancer()).reader, {
      now: fortyTwoSecondsLater,
    });

    await expect(service.describe("nginx-ils-service", "default")).resolves.toEqual({
      name: "nginx-ils-service",
      namespace: "default",
      type: "LoadBalancer",
      clusterIP: "10.96.12.34",
      externalIP: "<pending>",
      ports: "80:30062/TCP",
      age: "42s",
      pending: true,
    });
  });

  it("shows the ingress addresses once provisioned", async () => {
    const service = new ServiceStatusService(
      readerOf(loadBalancer([{ ip: "192.168.49.100" }, { hostname: "lb.example.test" }])).reader,
      { now: fortyTwoSecondsLater }
    );

    const status = await service.describe("nginx-ils-service", "default");
    expect(status.externalIP).toBe("192.168.49.100,lb.example.test");
    expect(status.pending).toBe(false);
  });

  it("shows <none> for a NodePort service", async () => {
    const nodePort: V1Service = {
      metadata: { name: "web" },
      spec: { type: "NodePort", clusterIP: "10.96.0.20", ports: [{ port: 8080, nodePort: 31000 }] },
    };
    const service = new ServiceStatusService(readerOf(nodePort).reader, { now: fortyTwoSecondsLater });

    const status = await service.describe("web", "apps");
    expect(status).toMatchObject({
      name: "web",
      namespace: "apps",
      externalIP: "<none>",
      ports: "8080:31000/TCP",
      age: "<unknown>",
      pending: false,
    });
  });

  it("reports a missing service as not-found", async () => {
    const reader: ServiceReader = {
      readNamespacedService: () =>
        Promise.reject(new HttpError(new IncomingMessage(new Socket()), {}, 404)),
    };
    const service = new ServiceStatusService(reader);

    await expect(service.describe("ghost", "default")).rejects.toMatchObject({
      kind: "not-found",
      message: "Service ghost not found in namespace default",
    });
  });

  it("rethrows other API errors", async () => {
    const reader: ServiceReader = {
      readNamespacedService: () => Promise.reject(new Error("connect ECONNREFUSED 127.0.0.1:8443")),
    };
    const service = new ServiceStatusService(reader);

    await expect(service.describe("nginx-ils-service", "default")).rejects.toThrow(
      "connect ECONNREFUSED 127.0.0.1:8443"
    );
  });
});

describe("ServiceStatusService.waitForExternalIp", () => {
  it("polls until an address is assigned", async () => {
    const { reader, calls } = readerOf(
      loadBalancer(),
      loadBalancer(),
      loadBalancer([{ ip: "192.168.49.100" }])
    );
    const sleep = jest.fn().mockResolvedValue(undefined);
    const service = new ServiceStatusService(reader, { now: fortyTwoSecondsLater, sleep });

    const status = await service.waitForExternalIp("nginx-ils-service", "default", {
      timeoutMs: 60_000,
      intervalMs: 1_000,
    });

    expect(status.externalIP).toBe("192.168.49.100");
    expect(calls()).toBe(3);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(1_000);
  });

  it("gives up once the timeout has passed", async () => {
    let ms = 0;
    const now = () => new Date((ms += 1_000));
    const { reader, calls } = readerOf(loadBalancer());
    const service = new ServiceStatusService(reader, {
      now,
      sleep: () => Promise.resolve(),
    });

    await expect(
      service.waitForExternalIp("nginx-ils-service", "default", {
        timeoutMs: 2_500,
        intervalMs: 1_000,
      })
    ).rejects.toMatchObject({
      kind: "timeout",
      message: "External IP of nginx-ils-service still <pending> after 2500ms",
    });
    expect(calls()).toBe(2);
  });
});

describe("renderServiceStatus", () => {
  it("renders kubectl-style columns", () => {
    expect(
      renderServiceStatus({
        name: "nginx-ils-service",
        namespace: "default",
        type: "LoadBalancer",
        clusterIP: "10.96.12.34",
        externalIP: "192.168.49.100",
        ports: "80:30062/TCP",
        age: "42s",
        pending: false,
      })
    ).toEqual([
      "NAME                TYPE           CLUSTER-IP    EXTERNAL-IP      PORT(S)        AGE",
      "nginx-ils-service   LoadBalancer   10.96.12.34   192.168.49.100   80:30062/TCP   42s",
    ]);
  });
});
