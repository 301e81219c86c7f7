import { envConfig } from "../config/env";
import { CommandRunner, ExecCommandRunner } from "../utils/exec";
import { KubectlService } from "../services/kubectl.service";
import { MinikubeService } from "../services/minikube.service";

export interface CommandContext {
  runner: CommandRunner;
  minikube: MinikubeService;
  kubectl: KubectlService;
}

export const createContext = (runner: CommandRunner = new ExecCommandRunner()): CommandContext => ({
  runner,
  minikube: new MinikubeService(runner, envConfig.MINIKUBE_BIN),
  kubectl: new KubectlService(runner, envConfig.KUBECTL_BIN),
});
