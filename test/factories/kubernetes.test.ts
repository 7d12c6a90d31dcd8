import { describe, expect, it } from 'vitest';
import { ref } from '../../src/core/references/index.js';
import { cloud, kubernetes } from '../../src/factories/index.js';

describe('Kubernetes factories', () => {
  const cluster = 'test-cluster';
  const ns = kubernetes.namespace({ name: 'identity', cluster, labels: { team: 'platform' } });

  it('should place workload nodes in the application stage behind the cluster binding', () => {
    expect(ns.id).toBe('namespace-identity');
    expect(ns.stage).toBe('application');
    expect(ns.provider).toBe('test-cluster');
    expect(ns.inputs).toEqual({
      manifest: {
        apiVersion: 'v1',
        kind: 'Namespace',
        metadata: { name: 'identity', labels: { team: 'platform' } },
      },
    });
  });

  it('should reference a namespace node and depend on it', () => {
    const secret = kubernetes.secret({
      name: 'db',
      namespace: ns,
      cluster,
      stringData: { host: ref('database-instance-pg', 'privateIp') },
    });

    expect(secret.dependsOn).toEqual(['namespace-identity']);
    expect(secret.inputs.manifest).toEqual({
      apiVersion: 'v1',
      kind: 'Secret',
      metadata: { name: 'db', namespace: ref('namespace-identity', 'name') },
      type: 'Opaque',
      stringData: { host: ref('database-instance-pg', 'privateIp') },
    });
  });

  it('should take a namespace by name without a dependency', () => {
    const secret = kubernetes.secret({ name: 'db', namespace: 'default', cluster, stringData: {} });

    expect(secret.dependsOn).toEqual([]);
    expect(secret.inputs.manifest).toMatchObject({ metadata: { namespace: 'default' } });
  });

  it('should put explicit dependencies before the namespace', () => {
    const instance = kubernetes.workloadInstance({
      name: 'server',
      namespace: ns,
      cluster,
      apiVersion: 'example.test/v1',
      resourceKind: 'Server',
      dependsOn: ['operator-deployment-op'],
      spec: { replicas: 1 },
    });

    expect(instance.dependsOn).toEqual(['operator-deployment-op', 'namespace-identity']);
    expect(instance.inputs.manifest).toMatchObject({ kind: 'Server', spec: { replicas: 1 } });
  });

  it('should annotate a service account with its cloud identity', () => {
    const identity = cloud.serviceIdentity({ name: 'server' });
    const account = kubernetes.workloadServiceAccount({ name: 'server', namespace: ns, cluster, identity });

    expect(account.id).toBe('workload-service-account-server');
    expect(account.inputs.manifest).toMatchObject({
      kind: 'ServiceAccount',
      metadata: {
        annotations: { [kubernetes.WORKLOAD_IDENTITY_ANNOTATION]: ref('service-identity-server', 'email') },
      },
    });
  });

  it('should carry a manifest url instead of inline inputs for remote bundles', () => {
    const crds = kubernetes.customResourceDefinitions({
      name: 'operator-crds',
      cluster,
      url: 'https://manifests.example.test/crds.yml',
    });

    expect(crds.id).toBe('custom-resource-definition-operator-crds');
    expect(crds.manifestUrl).toBe('https://manifests.example.test/crds.yml');
    expect(crds.inputs).toEqual({});
  });

  it('should fill release manifest urls', () => {
    expect(kubernetes.releaseManifestUrl('https://example.test/op/{version}/crds.yml', '1.2.0')).toBe(
      'https://example.test/op/1.2.0/crds.yml'
    );
    expect(kubernetes.releaseManifestUrl('https://example.test/{version}/{version}.yml', '1.0+b')).toBe(
      'https://example.test/1.0%2Bb/1.0%2Bb.yml'
    );
  });

  describe('edge objects', () => {
    const frontend = kubernetes.networkPolicyConfig({
      name: 'frontend',
      namespace: ns,
      cluster,
      sslPolicy: 'modern-tls',
      redirectToHttps: true,
    });
    const certificate = kubernetes.certificate({ name: 'cert', namespace: ns, cluster, domains: ['id.example.test'] });

    it('should build a front end policy by default', () => {
      expect(frontend.inputs.manifest).toEqual({
        apiVersion: 'networking.gke.io/v1beta1',
        kind: 'FrontendConfig',
        metadata: { name: 'frontend', namespace: ref('namespace-identity', 'name') },
        spec: { sslPolicy: 'modern-tls', redirectToHttps: { enabled: true } },
      });
    });

    it('should build a back end policy with a security policy', () => {
      const backend = kubernetes.networkPolicyConfig({
        name: 'backend',
        namespace: ns,
        cluster,
        policyKind: 'BackendConfig',
        securityPolicy: 'edge',
        sslPolicy: 'ignored',
      });

      expect(backend.inputs.manifest).toMatchObject({
        apiVersion: 'cloud.google.com/v1',
        kind: 'BackendConfig',
        spec: { securityPolicy: { name: 'edge' } },
      });
    });

    it('should reference certificate and front end policy from ingress annotations', () => {
      const ingress = kubernetes.ingress({
        name: 'edge',
        namespace: ns,
        cluster,
        host: 'id.example.test',
        serviceName: 'server',
        servicePort: 8443,
        staticIpName: 'edge-ip',
        certificate,
        frontendConfig: frontend,
      });

      expect(ingress.inputs.manifest).toMatchObject({
        metadata: {
          annotations: {
            'kubernetes.io/ingress.global-static-ip-name': 'edge-ip',
            'networking.gke.io/managed-certificates': ref('certificate-cert', 'name'),
            'networking.gke.io/v1beta1.FrontendConfig': ref('network-policy-config-frontend', 'name'),
          },
        },
      });
    });

    it('should leave annotations empty without edge objects', () => {
      const ingress = kubernetes.ingress({
        name: 'plain',
        namespace: 'default',
        cluster,
        host: 'id.example.test',
        serviceName: 'server',
        servicePort: 80,
      });

      expect(ingress.inputs.manifest).toEqual({
        apiVersion: 'networking.k8s.io/v1',
        kind: 'Ingress',
        metadata: { name: 'plain', namespace: 'default', annotations: {} },
        spec: {
          rules: [
            {
              host: 'id.example.test',
              http: {
                paths: [
                  {
                    path: '/',
                    pathType: 'Prefix',
                    backend: { service: { name: 'server', port: { number: 80 } } },
                  },
                ],
              },
            },
          ],
        },
      });
    });
  });
});
