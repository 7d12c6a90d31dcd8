/**
 * Identity platform example
 *
 * A VPC with a private-service peering to a managed PostgreSQL instance, a
 * cluster with workload identity, and an identity server deployed by its
 * operator. Cluster objects are applied through the cluster's provider
 * binding; database grants through the database binding. Both bindings are
 * sourced from infrastructure outputs, so everything they serve runs in the
 * application stage.
 */

import { type } from 'arktype';
import {
  type CloudResourceApi,
  cloud,
  databaseGrantBinding,
  defineTopology,
  formatArktypeError,
  type GrantInterface,
  kubernetes,
  kubernetesClusterBinding,
  type ProviderBindingDefinition,
  ref,
  type ResourceNode,
  template,
} from '../src/index.js';

const IdentityPlatformSettingsSchema = type({
  project: 'string > 0',
  region: 'string > 0',
  domain: 'string > 0',
  operatorVersion: 'string > 0',
  'enableIngress?': 'boolean',
  'enableNetworkPolicy?': 'boolean',
  'enableCertificate?': 'boolean',
});

export type IdentityPlatformSettings = typeof IdentityPlatformSettingsSchema.infer;

export const CLUSTER_BINDING = 'identity-cluster';
export const DATABASE_BINDING = 'identity-database';

const OPERATOR_MANIFEST_BASE = 'https://manifests.example.test/identity-operator';

export interface IdentityPlatform {
  nodes: ResourceNode[];
  bindings: ProviderBindingDefinition[];
}

export interface IdentityPlatformDependencies {
  cloud: CloudResourceApi;
  /** Opens a grant session against the instance's private address */
  openGrants: (connection: { host: string; instance: string }) => Promise<GrantInterface> | GrantInterface;
}

export function identityPlatform(
  input: IdentityPlatformSettings,
  dependencies: IdentityPlatformDependencies
): IdentityPlatform {
  const parsed = IdentityPlatformSettingsSchema(input);
  if (parsed instanceof type.errors) {
    throw formatArktypeError(parsed, 'identity-platform');
  }
  const settings = parsed;
  const workloadPool = `${settings.project}.svc.id.goog`;

  let clusterNodeId = '';
  let instanceNodeId = '';

  const nodes = defineTopology('identity-platform', () => {
    // Network and private service access
    const vpc = cloud.network({ name: 'identity-vpc' });
    const subnet = cloud.subnet({
      name: 'identity-nodes',
      network: vpc,
      region: settings.region,
      ipCidrRange: '10.10.0.0/20',
      secondaryRanges: [
        { rangeName: 'pods', ipCidrRange: '10.20.0.0/14' },
        { rangeName: 'services', ipCidrRange: '10.24.0.0/20' },
      ],
    });
    const peeringRange = cloud.peeringRange({ name: 'identity-private-services', network: vpc, prefixLength: 16 });
    const peering = cloud.peeringConnection({
      name: 'identity-peering',
      network: vpc,
      ranges: [peeringRange],
      service: 'servicenetworking.googleapis.com',
      // Removing the connection is left to the network's deletion
      deletionPolicy: 'abandon',
    });

    // Database
    const instance = cloud.databaseInstance({
      name: 'identity-postgres',
      databaseVersion: 'POSTGRES_15',
      region: settings.region,
      tier: 'db-custom-2-7680',
      network: vpc,
      dependsOn: [peering.id],
      deletionPolicy: 'protect',
    });
    instanceNodeId = instance.id;
    const db = cloud.database({ name: 'identity', instance });
    const serverUser = cloud.databaseUser({ name: 'identity-server', instance });
    const migrationsUser = cloud.databaseUser({ name: 'identity-migrations', instance });
    cloud.grantSet({
      name: 'identity-all',
      principals: [serverUser, migrationsUser],
      target: db,
      privilege: 'ALL PRIVILEGES',
      provider: DATABASE_BINDING,
    });

    // Cluster and workload identity
    const gke = cloud.cluster({
      name: 'identity-cluster',
      location: settings.region,
      network: vpc,
      subnet,
      podRange: 'pods',
      serviceRange: 'services',
      workloadPool,
      nodePools: [{ name: 'default', machineType: 'e2-standard-4', minNodes: 1, maxNodes: 3 }],
    });
    clusterNodeId = gke.id;
    const identity = cloud.serviceIdentity({ name: 'identity-server', displayName: 'Identity server' });
    cloud.identityBinding({
      name: 'identity-server-sql-client',
      identity,
      role: 'roles/cloudsql.client',
      resource: `projects/${settings.project}`,
    });
    cloud.identityBinding({
      name: 'identity-server-workload',
      identity,
      role: 'roles/iam.workloadIdentityUser',
      workload: { pool: workloadPool, namespace: 'identity', serviceAccount: 'identity-server' },
    });

    // Cluster objects
    const cluster = CLUSTER_BINDING;
    const ns = kubernetes.namespace({ name: 'identity', cluster });
    const serviceAccount = kubernetes.workloadServiceAccount({
      name: 'identity-server',
      namespace: ns,
      cluster,
      identity,
    });
    const crds = kubernetes.customResourceDefinitions({
      name: 'identity-operator-crds',
      cluster,
      url: kubernetes.releaseManifestUrl(`${OPERATOR_MANIFEST_BASE}/{version}/crds.yml`, settings.operatorVersion),
    });
    const operator = kubernetes.operatorDeployment({
      name: 'identity-operator',
      cluster,
      url: kubernetes.releaseManifestUrl(
        `${OPERATOR_MANIFEST_BASE}/{version}/operator.yml`,
        settings.operatorVersion
      ),
      dependsOn: [crds.id, ns.id],
    });
    const dbSecret = kubernetes.secret({
      name: 'identity-db',
      namespace: ns,
      cluster,
      stringData: {
        host: ref<string>(instance.id, 'privateIp'),
        database: ref<string>(db.id, 'name'),
        username: ref<string>(serverUser.id, 'name'),
        url: template`jdbc:postgresql://${ref<string>(instance.id, 'privateIp')}:5432/${ref<string>(db.id, 'name')}`,
      },
    });
    kubernetes.workloadInstance({
      name: 'identity-server',
      namespace: ns,
      cluster,
      apiVersion: 'k8s.keycloak.org/v2alpha1',
      resourceKind: 'Keycloak',
      dependsOn: [operator.id, serviceAccount.id, dbSecret.id],
      spec: {
        instances: 1,
        hostname: { hostname: settings.domain },
        db: {
          vendor: 'postgres',
          host: ref<string>(instance.id, 'privateIp'),
          database: ref<string>(db.id, 'name'),
          usernameSecret: { name: 'identity-db', key: 'username' },
        },
      },
    });

    const frontend = kubernetes.networkPolicyConfig({
      name: 'identity-frontend',
      namespace: ns,
      cluster,
      sslPolicy: 'identity-modern-tls',
      redirectToHttps: true,
      enabled: settings.enableNetworkPolicy ?? true,
    });
    const certificate = kubernetes.certificate({
      name: 'identity-certificate',
      namespace: ns,
      cluster,
      domains: [settings.domain],
      enabled: settings.enableCertificate ?? true,
    });
    kubernetes.ingress({
      name: 'identity-ingress',
      namespace: ns,
      cluster,
      host: settings.domain,
      serviceName: 'identity-server-service',
      servicePort: 8443,
      ...((settings.enableCertificate ?? true) && { certificate }),
      ...((settings.enableNetworkPolicy ?? true) && { frontendConfig: frontend }),
      enabled: settings.enableIngress ?? true,
    });
  });

  const bindings: ProviderBindingDefinition[] = [
    kubernetesClusterBinding({ name: CLUSTER_BINDING, clusterNodeId, cloud: dependencies.cloud }),
    databaseGrantBinding({
      name: DATABASE_BINDING,
      inputs: {
        host: ref<string>(instanceNodeId, 'privateIp'),
        instance: ref<string>(instanceNodeId, 'connectionName'),
      },
      connect: (values) => {
        const { host, instance } = values;
        if (typeof host !== 'string' || typeof instance !== 'string') {
          throw new TypeError('database binding needs string host and instance values');
        }
        return dependencies.openGrants({ host, instance });
      },
    }),
  ];

  return { nodes, bindings };
}
