import { ConnectionError } from '../errors.js';

export type Endpoint =
  | { kind: 'tcpin'; host: string; port: number }
  | { kind: 'tcpout'; host: string; port: number }
  | { kind: 'udpin'; host: string; port: number }
  | { kind: 'udpout'; host: string; port: number }
  | { kind: 'serial'; path: string; baudRate: number | null };

export type EndpointKind = Endpoint['kind'];

const NETWORK_SCHEMES: ReadonlySet<string> = new Set(['tcpin', 'tcpout', 'udpin', 'udpout']);

export const CONNECTION_URL_FORMATS: ReadonlyArray<{ label: string; format: string }> = [
  { label: 'TCP server', format: 'tcpin://<our_ip>:<port>' },
  { label: 'TCP client', format: 'tcpout://<remote_ip>:<port>' },
  { label: 'UDP server', format: 'udpin://<our_ip>:<port>' },
  { label: 'UDP client', format: 'udpout://<remote_ip>:<port>' },
  { label: 'Serial', format: 'serial://</path/to/serial/dev>[:<baudrate>]' }
];

function parsePort(raw: string, url: string): number {
  if (!/^\d+$/.test(raw)) {
    throw new ConnectionError(`Invalid port "${raw}" in ${url}`);
  }
  const port = Number(raw);
  if (port < 1 || port > 65535) {
    throw new ConnectionError(`Port out of range in ${url}`);
  }
  return port;
}

function isNetworkScheme(value: string): value is Exclude<EndpointKind, 'serial'> {
  return NETWORK_SCHEMES.has(value);
}

export function parseConnectionUrl(url: string): Endpoint {
  const trimmed = url.trim();
  const match = /^([a-z]+):\/\/(.*)$/i.exec(trimmed);
  if (!match) {
    throw new ConnectionError(`Invalid connection URL: ${url}`);
  }
  const [, rawScheme, rest] = match;
  const scheme = rawScheme.toLowerCase();

  if (scheme === 'serial') {
    const serial = /^(.+?)(?::(\d+))?$/.exec(rest);
    if (!serial || serial[1].length === 0) {
      throw new ConnectionError(`Missing serial device in ${url}`);
    }
    const baudRate = serial[2] ? Number(serial[2]) : null;
    if (baudRate !== null && baudRate <= 0) {
      throw new ConnectionError(`Invalid baud rate in ${url}`);
    }
    return { kind: 'serial', path: serial[1], baudRate };
  }

  if (!isNetworkScheme(scheme)) {
    throw new ConnectionError(`Unsupported connection scheme "${rawScheme}" in ${url}`);
  }

  const separator = rest.lastIndexOf(':');
  if (separator <= 0) {
    throw new ConnectionError(`Expected <host>:<port> in ${url}`);
  }
  const host = rest.slice(0, separator).replace(/^\[(.*)\]$/, '$1');
  const port = parsePort(rest.slice(separator + 1), url);
  return { kind: scheme, host, port };
}

export function describeEndpoint(endpoint: Endpoint): string {
  if (endpoint.kind === 'serial') {
    return endpoint.baudRate === null
      ? `serial://${endpoint.path}`
      : `serial://${endpoint.path}:${endpoint.baudRate}`;
  }
  return `${endpoint.kind}://${endpoint.host}:${endpoint.port}`;
}
