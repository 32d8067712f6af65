import axios from 'axios';

// Usage: SMOKE_BASE_URL=http://localhost:8080 SMOKE_TOKEN=<access token> npm run smoke
async function main() {
  const base = process.env.SMOKE_BASE_URL || 'http://localhost:8080';
  const token = process.env.SMOKE_TOKEN;
  try {
    // 1. Health
    const health = await axios.get(base + '/healthz');
    console.log('HEALTH', health.data);
  } catch (_e) {
    console.error('Health check failed. Is server running?');
    process.exit(1);
  }
  // 2. Readiness (credential state)
  const ready = await axios.get(base + '/readyz', { validateStatus: () => true });
  console.log('READY', ready.status, ready.data.credential?.state);

  // 3. CA key and docs need no token
  const ca = await axios.get(base + '/api/v1/ssh/ca-public-key');
  console.log('CA key type:', String(ca.data.publicKey).split(' ')[0]);
  const docs = await axios.get(base + '/api/docs.json');
  console.log('API paths:', Object.keys(docs.data.paths).length);

  if (!token) {
    console.log('SMOKE_TOKEN not set; skipping authenticated checks.');
    return;
  }
  const auth = { headers: { Authorization: `Bearer ${token}` } };

  // 4. Who am I, and what may I sign as
  const me = await axios.get(base + '/api/v1/auth/userinfo', auth);
  console.log('User:', { username: me.data.username, role: me.data.role });
  const roles = await axios.get(base + '/api/v1/ssh/roles', auth);
  console.log('Roles:', roles.data.items.map((r: { name: string }) => r.name).join(', '));

  // 5. Kubeconfig download
  const kube = await axios.get(base + '/api/v1/kubeconfig', { ...auth, responseType: 'text' });
  console.log('Kubeconfig first line:', String(kube.data).split('\n')[0]);

  console.log('Smoke test complete.');
}

main().catch(_err => { console.error('Smoke test error'); process.exit(1); });
