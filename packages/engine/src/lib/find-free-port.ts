import { createServer } from "node:net";

const MIN_PORT = 1024;
const MAX_PORT = 65535;
const MAX_ATTEMPTS = 128;

function tryBind(host: string, port: number): Promise<number | null> {
  return new Promise((resolve) => {
    const server = createServer();
    server.once("error", () => resolve(null));
    server.listen(port, host, () => {
      const address = server.address();
      const bound = typeof address === "object" && address !== null ? address.port : null;
      server.close(() => resolve(bound));
    });
  });
}

/**
 * Picks a random free port by bind-testing, falling back to an OS-assigned one
 * once `attempts` random picks have failed.
 */
export async function findFreePort(
  host = "127.0.0.1",
  opts: { attempts?: number; random?: () => number } = {},
): Promise<number> {
  const attempts = opts.attempts ?? MAX_ATTEMPTS;
  const random = opts.random ?? Math.random;

  for (let i = 0; i < attempts; i++) {
    const port = MIN_PORT + Math.floor(random() * (MAX_PORT - MIN_PORT + 1));
    const bound = await tryBind(host, port);
    if (bound !== null) return bound;
  }

  const fallback = await tryBind(host, 0);
  if (fallback === null) {
    throw new Error(`No free port available on ${host}`);
  }
  return fallback;
}
