/**
 * SSH-related types
 */

export interface SSHConnectionConfig {
  host: string;
  port: number;
  username: string;
  password: string;
  readyTimeout: number;
  keepaliveInterval?: number;
}

export interface PTYOptions {
  cols: number;
  rows: number;
  term?: string;
}
