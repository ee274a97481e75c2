import { Agent } from 'undici';

const agents = new Map<string, Agent>();

/** One keep-alive pool per upstream host. */
export function getAgent(key: string) {
  let a = agents.get(key);
  if (!a) {
    a = new Agent({
      keepAliveTimeout: 10_000,
      keepAliveMaxTimeout: 60_000,
      connections: 16,
    });
    agents.set(key, a);
  }
  return a;
}

export async function closeAgents(): Promise<void> {
  const all = Array.from(agents.values());
  agents.clear();
  await Promise.all(all.map((a) => a.close()));
}
