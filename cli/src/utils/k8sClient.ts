import * as k8s from "@kubernetes/client-node";

let coreV1Api: k8s.CoreV1Api | undefined;

/**
 * Loads kubeconfig the first time it is needed:
 * - Local dev → ~/.kube/config (the minikube context)
 * - In-cluster → ServiceAccount
 */
export const getCoreV1Api = (): k8s.CoreV1Api => {
  if (!coreV1Api) {
    const kc = new k8s.KubeConfig();
    kc.loadFromDefault();
    coreV1Api = kc.makeApiClient(k8s.CoreV1Api);
  }
  return coreV1Api;
};
