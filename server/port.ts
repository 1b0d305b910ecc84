import net from "node:net";

// Tried in order when PORT is unset or taken
export const PREFERRED_PORTS: readonly number[] = [3000, 3001, 8080];

function tryListen(port: number): Promise<boolean> {
  return new Promise<boolean>((resolve) => {
    const tester = net.createServer()
      .once('error', () => resolve(false))
      .once('listening', () => {
        tester.close(() => resolve(true));
      })
      .listen(port, '0.0.0.0');
  });
}

/**
 * Choose a free port: the requested one if it is free, then the candidates,
 * then whatever the OS assigns.
 */
export async function findAvailablePort(requested: number | null, candidates: readonly number[] = PREFERRED_PORTS): Promise<number> {
  if (requested !== null && await tryListen(requested)) return requested;
  for (const p of candidates) {
    if (await tryListen(p)) return p;
  }
  // Last resort: OS-assigned ephemeral
  return await new Promise<number>((resolve) => {
    const s = net.createServer()
      .once('listening', () => {
        const addr = s.address();
        const chosen = typeof addr === 'object' && addr ? addr.port : 0;
        s.close(() => resolve(chosen));
      })
      .listen(0, '0.0.0.0');
  });
}
