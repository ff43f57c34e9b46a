import { EventEmitter } from 'node:events';
import dgram from 'node:dgram';
import net from 'node:net';
import { SerialPort } from 'serialport';
import { ConnectionError } from '../errors.js';
import { describeEndpoint, type Endpoint } from './url.js';

export type LocalAddress = { address: string; port: number };

export interface Transport {
  readonly description: string;
  /** Where a network transport is bound; null for serial devices. */
  localAddress(): LocalAddress | null;
  on(event: 'data', listener: (chunk: Buffer) => void): this;
  on(event: 'error', listener: (error: Error) => void): this;
  off(event: 'data', listener: (chunk: Buffer) => void): this;
  off(event: 'error', listener: (error: Error) => void): this;
  /** Best effort; dropped while there is no peer to send to. */
  send(chunk: Buffer): void;
  close(): Promise<void>;
}

function connectionError(endpoint: Endpoint, error: unknown): ConnectionError {
  const message = error instanceof Error ? error.message : String(error);
  return new ConnectionError(`${describeEndpoint(endpoint)}: ${message}`, { cause: error });
}

function socketType(host: string): dgram.SocketType {
  return net.isIPv6(host) ? 'udp6' : 'udp4';
}

abstract class BaseTransport extends EventEmitter implements Transport {
  readonly description: string;

  protected constructor(endpoint: Endpoint) {
    super();
    this.description = describeEndpoint(endpoint);
  }

  protected forward(chunk: Buffer) {
    this.emit('data', chunk);
  }

  protected fail(error: Error) {
    if (this.listenerCount('error') > 0) {
      this.emit('error', error);
    }
  }

  abstract localAddress(): LocalAddress | null;
  abstract send(chunk: Buffer): void;
  abstract close(): Promise<void>;
}

/** tcpin: accepts any number of peers and merges their streams. */
class TcpServerTransport extends BaseTransport {
  private readonly server: net.Server;
  private readonly sockets = new Set<net.Socket>();

  private constructor(endpoint: Endpoint, server: net.Server) {
    super(endpoint);
    this.server = server;
    server.on('connection', socket => {
      this.sockets.add(socket);
      socket.on('data', chunk => this.forward(chunk));
      socket.on('error', error => this.fail(error));
      socket.on('close', () => this.sockets.delete(socket));
    });
    server.on('error', error => this.fail(error));
  }

  static open(endpoint: Extract<Endpoint, { kind: 'tcpin' }>): Promise<TcpServerTransport> {
    return new Promise((resolve, reject) => {
      const server = net.createServer();
      const onError = (error: Error) => {
        reject(connectionError(endpoint, error));
      };
      server.once('error', onError);
      server.listen(endpoint.port, endpoint.host, () => {
        server.off('error', onError);
        resolve(new TcpServerTransport(endpoint, server));
      });
    });
  }

  localAddress(): LocalAddress | null {
    const address = this.server.address();
    if (address === null || typeof address === 'string') {
      return null;
    }
    return { address: address.address, port: address.port };
  }

  send(chunk: Buffer): void {
    for (const socket of this.sockets) {
      socket.write(chunk);
    }
  }

  close(): Promise<void> {
    for (const socket of this.sockets) {
      socket.destroy();
    }
    this.sockets.clear();
    return new Promise(resolve => {
      this.server.close(() => resolve());
    });
  }
}

class TcpClientTransport extends BaseTransport {
  private readonly socket: net.Socket;

  private constructor(endpoint: Endpoint, socket: net.Socket) {
    super(endpoint);
    this.socket = socket;
    socket.on('data', chunk => this.forward(chunk));
    socket.on('error', error => this.fail(error));
  }

  static open(endpoint: Extract<Endpoint, { kind: 'tcpout' }>): Promise<TcpClientTransport> {
    return new Promise((resolve, reject) => {
      const socket = net.createConnection({ host: endpoint.host, port: endpoint.port });
      const onError = (error: Error) => {
        socket.destroy();
        reject(connectionError(endpoint, error));
      };
      socket.once('error', onError);
      socket.once('connect', () => {
        socket.off('error', onError);
        resolve(new TcpClientTransport(endpoint, socket));
      });
    });
  }

  localAddress(): LocalAddress | null {
    const { localAddress, localPort } = this.socket;
    if (localAddress === undefined || localPort === undefined) {
      return null;
    }
    return { address: localAddress, port: localPort };
  }

  send(chunk: Buffer): void {
    if (!this.socket.destroyed) {
      this.socket.write(chunk);
    }
  }

  close(): Promise<void> {
    if (this.socket.destroyed) {
      return Promise.resolve();
    }
    return new Promise(resolve => {
      this.socket.once('close', () => resolve());
      this.socket.destroy();
    });
  }
}

/**
 * udpin binds locally and replies to the last peer heard from; udpout sends
 * to the configured remote from an ephemeral port.
 */
class UdpTransport extends BaseTransport {
  private readonly socket: dgram.Socket;
  private remote: LocalAddress | null;
  private closed = false;

  private constructor(
    endpoint: Endpoint,
    socket: dgram.Socket,
    remote: LocalAddress | null
  ) {
    super(endpoint);
    this.socket = socket;
    this.remote = remote;
    const learnPeer = remote === null;
    socket.on('message', (chunk, rinfo) => {
      if (learnPeer) {
        this.remote = { address: rinfo.address, port: rinfo.port };
      }
      this.forward(chunk);
    });
    socket.on('error', error => this.fail(error));
  }

  static open(endpoint: Extract<Endpoint, { kind: 'udpin' | 'udpout' }>): Promise<UdpTransport> {
    return new Promise((resolve, reject) => {
      const socket = dgram.createSocket(socketType(endpoint.host));
      const onError = (error: Error) => {
        socket.close();
        reject(connectionError(endpoint, error));
      };
      socket.once('error', onError);
      const onListening = () => {
        socket.off('error', onError);
        const remote =
          endpoint.kind === 'udpout' ? { address: endpoint.host, port: endpoint.port } : null;
        resolve(new UdpTransport(endpoint, socket, remote));
      };
      if (endpoint.kind === 'udpin') {
        socket.bind(endpoint.port, endpoint.host, onListening);
      } else {
        socket.bind(0, onListening);
      }
    });
  }

  localAddress(): LocalAddress | null {
    if (this.closed) {
      return null;
    }
    const { address, port } = this.socket.address();
    return { address, port };
  }

  send(chunk: Buffer): void {
    if (this.closed || !this.remote) {
      return;
    }
    this.socket.send(chunk, this.remote.port, this.remote.address, error => {
      if (error) {
        this.fail(error);
      }
    });
  }

  close(): Promise<void> {
    if (this.closed) {
      return Promise.resolve();
    }
    this.closed = true;
    return new Promise(resolve => {
      this.socket.close(() => resolve());
    });
  }
}

/** Baud rate used when the serial URL does not name one. */
export const DEFAULT_SERIAL_BAUD_RATE = 57600;

export type SerialPortOptions = { path: string; baudRate: number };

/** The part of a `serialport` stream the transport drives. */
export interface SerialDevice {
  readonly isOpen: boolean;
  open(callback: (error: Error | null) => void): void;
  write(chunk: Buffer): boolean;
  close(callback: (error: Error | null) => void): void;
  on(event: 'data', listener: (chunk: Buffer) => void): this;
  on(event: 'error', listener: (error: Error) => void): this;
}

export type SerialPortFactory = (options: SerialPortOptions) => SerialDevice;

const createSerialPort: SerialPortFactory = options =>
  new SerialPort({ ...options, autoOpen: false });

/** Opens the device with the requested line speed through `serialport`. */
class SerialTransport extends BaseTransport {
  private readonly port: SerialDevice;

  private constructor(endpoint: Endpoint, port: SerialDevice) {
    super(endpoint);
    this.port = port;
    port.on('data', chunk => this.forward(chunk));
    port.on('error', error => this.fail(error));
  }

  static open(
    endpoint: Extract<Endpoint, { kind: 'serial' }>,
    create: SerialPortFactory = createSerialPort
  ): Promise<SerialTransport> {
    return new Promise((resolve, reject) => {
      const port = create({
        path: endpoint.path,
        baudRate: endpoint.baudRate ?? DEFAULT_SERIAL_BAUD_RATE
      });
      port.open(error => {
        if (error) {
          reject(connectionError(endpoint, error));
          return;
        }
        resolve(new SerialTransport(endpoint, port));
      });
    });
  }

  localAddress(): LocalAddress | null {
    return null;
  }

  send(chunk: Buffer): void {
    if (this.port.isOpen) {
      this.port.write(chunk);
    }
  }

  close(): Promise<void> {
    if (!this.port.isOpen) {
      return Promise.resolve();
    }
    return new Promise(resolve => {
      this.port.close(error => {
        if (error) {
          this.fail(error);
        }
        resolve();
      });
    });
  }
}

export type OpenTransportOptions = {
  createSerialPort?: SerialPortFactory;
};

export function openTransport(
  endpoint: Endpoint,
  options: OpenTransportOptions = {}
): Promise<Transport> {
  switch (endpoint.kind) {
    case 'tcpin':
      return TcpServerTransport.open(endpoint);
    case 'tcpout':
      return TcpClientTransport.open(endpoint);
    case 'udpin':
    case 'udpout':
      return UdpTransport.open(endpoint);
    case 'serial':
      return SerialTransport.open(endpoint, options.createSerialPort);
  }
}
