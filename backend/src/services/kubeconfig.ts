import * as yaml from 'yaml';

export interface ClusterAccessConfig {
  clusterName: string;
  apiServer: string;
  /** PEM bundle, embedded base64-encoded as certificate-authority-data. */
  caCert: Buffer;
  oidcIssuerUrl: string;
  oidcClientId: string;
}

export const KUBECONFIG_SCOPES = ['openid', 'profile', 'email', 'groups'] as const;

export function kubeconfigFilename(cluster: Pick<ClusterAccessConfig, 'clusterName'>): string {
  return `${cluster.clusterName}-kubeconfig.yaml`;
}

/**
 * Renders a kubeconfig whose user authenticates through the kubelogin exec
 * plugin. Same inputs always produce the same bytes.
 */
export function buildKubeconfig(principal: { username: string }, cluster: ClusterAccessConfig): string {
  const { clusterName } = cluster;
  const doc = {
    apiVersion: 'v1',
    kind: 'Config',
    preferences: {},
    clusters: [
      {
        name: clusterName,
        cluster: {
          server: cluster.apiServer,
          'certificate-authority-data': cluster.caCert.toString('base64'),
        },
      },
    ],
    contexts: [{ name: clusterName, context: { cluster: clusterName, user: principal.username } }],
    'current-context': clusterName,
    users: [
      {
        name: principal.username,
        user: {
          exec: {
            apiVersion: 'client.authentication.k8s.io/v1beta1',
            command: 'kubectl',
            args: [
              'oidc-login',
              'get-token',
              `--oidc-issuer-url=${cluster.oidcIssuerUrl}`,
              `--oidc-client-id=${cluster.oidcClientId}`,
              ...KUBECONFIG_SCOPES.map((scope) => `--oidc-extra-scope=${scope}`),
            ],
            interactiveMode: 'IfAvailable',
            provideClusterInfo: false,
          },
        },
      },
    ],
  };
  return yaml.stringify(doc, { lineWidth: 0 });
}
