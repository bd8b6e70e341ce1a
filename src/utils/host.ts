import dns from 'dns';
import os from 'os';

/**
 * IPv4 address the local host name resolves to
 */
export async function resolveHostAddress(): Promise<string> {
  const { address } = await dns.promises.lookup(os.hostname(), { family: 4 });
  return address;
}
