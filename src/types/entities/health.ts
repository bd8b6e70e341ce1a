/**
 * Health check type definitions
 */

export interface IHealth {
  status: number;
  status_message: string;
  timestamp: string;
  ip_address: string;
  echo: string | null;
  path_echo: string | null;
}

export type HostAddressResolver = () => Promise<string>;
