import { request } from 'node:http';

const PROBE_TIMEOUT_MS = 2_000;

/** GET a path on a local server; null on connection failure or timeout. */
function get(host: string, port: number, path: string): Promise<{ status: number; body: string } | null> {
  return new Promise((resolve) => {
    const req = request({ host, port, path, method: 'GET', timeout: PROBE_TIMEOUT_MS }, (res) => {
      let data = '';
      res.setEncoding('utf-8');
      res.on('data', (chunk: string) => data += chunk);
      res.on('end', () => resolve({ status: res.statusCode ?? 0, body: data }));
    });
    req.on('timeout', () => req.destroy());
    req.on('error', () => resolve(null));
    req.end();
  });
}

export async function isServerRunning(port: number, host = 'localhost'): Promise<boolean> {
  const res = await get(host, port, '/health');
  return res?.status === 200;
}

export async function getServerVersion(port: number, host = 'localhost'): Promise<string | null> {
  const res = await get(host, port, '/version');
  return res && res.status === 200 ? res.body.trim() : null;
}
