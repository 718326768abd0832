import * as k8s from '@kubernetes/client-node';
import { logger } from '@rollwatch/shared';

const log = logger.child({ module: 'kube' });

const OPENSHIFT_APPS_GROUP = 'apps.openshift.io';

/** The slice of the Kubernetes API the workload adapters call. */
export interface WorkloadClients {
  apps: Pick<
    k8s.AppsV1Api,
    | 'listNamespacedDeployment'
    | 'replaceNamespacedDeployment'
    | 'listNamespacedDaemonSet'
    | 'replaceNamespacedDaemonSet'
    | 'listNamespacedStatefulSet'
    | 'replaceNamespacedStatefulSet'
  >;
  batch: Pick<k8s.BatchV1Api, 'listNamespacedCronJob' | 'createNamespacedJob'>;
  custom: Pick<k8s.CustomObjectsApi, 'listNamespacedCustomObject' | 'replaceNamespacedCustomObject'>;
}

/** In-cluster config when running in a pod, ~/.kube/config otherwise. */
export function loadKubeConfig(): k8s.KubeConfig {
  const kc = new k8s.KubeConfig();
  if (process.env.KUBERNETES_SERVICE_HOST) {
    kc.loadFromCluster();
  } else {
    kc.loadFromDefault();
  }
  log.info({ context: kc.getCurrentContext() }, 'kubeconfig loaded');
  return kc;
}

export function createWorkloadClients(kc: k8s.KubeConfig): WorkloadClients {
  return {
    apps: kc.makeApiClient(k8s.AppsV1Api),
    batch: kc.makeApiClient(k8s.BatchV1Api),
    custom: kc.makeApiClient(k8s.CustomObjectsApi),
  };
}

/** True when the cluster serves the OpenShift apps API group (DeploymentConfigs). */
export async function detectOpenShift(apis: Pick<k8s.ApisApi, 'getAPIVersions'>): Promise<boolean> {
  try {
    const groups = await apis.getAPIVersions();
    const found = groups.groups.some((g) => g.name === OPENSHIFT_APPS_GROUP);
    log.info({ openshift: found }, 'OpenShift detection finished');
    return found;
  } catch (err) {
    log.warn({ err }, 'OpenShift detection failed, assuming plain Kubernetes');
    return false;
  }
}
