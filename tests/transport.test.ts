import dgram from 'node:dgram';
import net from 'node:net';
import { SerialPortMock } from 'serialport';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { ConnectionError } from '../src/errors.js';
import {
  DEFAULT_SERIAL_BAUD_RATE,
  openTransport,
  type SerialPortOptions,
  type Transport
} from '../src/connection/transport.js';

const FRAME = Buffer.from([0xfe, 0x09, 0x07, 0x01, 0x01, 0x00, 0x00, 0x00, 0x00, 0x00, 0x02, 0x0c, 0x51, 0x04, 0x03, 0x06, 0xc7]);
const REPLY = Buffer.from([0x01, 0x02, 0x03]);
const DEVICE = '/dev/ttyTEST0';

function nextChunk(transport: Transport): Promise<Buffer> {
  return new Promise(resolve => {
    transport.on('data', resolve);
  });
}

function boundPort(transport: Transport): number {
  const local = transport.localAddress();
  if (local === null) {
    throw new Error(`${transport.description} is not bound`);
  }
  return local.port;
}

function listen(server: net.Server): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('server has no port'));
        return;
      }
      resolve(address.port);
    });
  });
}

function closeServer(server: net.Server): Promise<void> {
  return new Promise(resolve => {
    server.close(() => resolve());
  });
}

function bindUdp(socket: dgram.Socket): Promise<number> {
  return new Promise(resolve => {
    socket.bind(0, '127.0.0.1', () => resolve(socket.address().port));
  });
}

function nextDatagram(socket: dgram.Socket): Promise<{ chunk: Buffer; port: number }> {
  return new Promise(resolve => {
    socket.once('message', (chunk, rinfo) => resolve({ chunk, port: rinfo.port }));
  });
}

describe('serial transport', () => {
  const opened: SerialPortMock[] = [];
  const createSerialPort = (options: SerialPortOptions) => {
    const port = new SerialPortMock({ ...options, autoOpen: false });
    opened.push(port);
    return port;
  };

  afterEach(() => {
    opened.length = 0;
    SerialPortMock.binding.reset();
  });

  it('opens the device at the default baud rate', async () => {
    SerialPortMock.binding.createPort(DEVICE, { record: true });

    const transport = await openTransport(
      { kind: 'serial', path: DEVICE, baudRate: null },
      { createSerialPort }
    );

    expect(transport.description).toBe(`serial://${DEVICE}`);
    expect(transport.localAddress()).toBeNull();
    expect(opened[0]?.baudRate).toBe(DEFAULT_SERIAL_BAUD_RATE);
    expect(DEFAULT_SERIAL_BAUD_RATE).toBe(57600);
    await transport.close();
  });

  it('applies the baud rate from the url', async () => {
    SerialPortMock.binding.createPort(DEVICE, { record: true });

    const transport = await openTransport(
      { kind: 'serial', path: DEVICE, baudRate: 115200 },
      { createSerialPort }
    );

    expect(opened[0]?.baudRate).toBe(115200);
    await transport.close();
  });

  it('forwards device bytes and writes back to the device', async () => {
    SerialPortMock.binding.createPort(DEVICE, { record: true });
    const transport = await openTransport(
      { kind: 'serial', path: DEVICE, baudRate: 57600 },
      { createSerialPort }
    );
    const device = opened[0]?.port;

    const chunk = nextChunk(transport);
    device?.emitData(FRAME);
    expect((await chunk).equals(FRAME)).toBe(true);

    transport.send(REPLY);
    await vi.waitFor(() => {
      expect(Array.from(device?.recording ?? [])).toEqual([1, 2, 3]);
    });

    await expect(transport.close()).resolves.toBeUndefined();
    expect(opened[0]?.isOpen).toBe(false);
    await expect(transport.close()).resolves.toBeUndefined();
  });

  it('fails to open a missing device', async () => {
    const error = await openTransport(
      { kind: 'serial', path: '/dev/ttyMISSING', baudRate: 57600 },
      { createSerialPort }
    ).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ConnectionError);
    expect(error).toHaveProperty(
      'message',
      expect.stringMatching(/^serial:\/\/\/dev\/ttyMISSING:57600: /)
    );
  });
});

describe('tcp transports', () => {
  it('tcpin forwards client bytes and replies to the client', async () => {
    const transport = await openTransport({ kind: 'tcpin', host: '127.0.0.1', port: 0 });
    const port = boundPort(transport);
    expect(transport.localAddress()).toEqual({ address: '127.0.0.1', port });

    const client = net.createConnection({ host: '127.0.0.1', port });
    const chunk = nextChunk(transport);
    client.write(FRAME);
    expect((await chunk).equals(FRAME)).toBe(true);

    const reply = new Promise<Buffer>(resolve => client.once('data', resolve));
    transport.send(REPLY);
    expect((await reply).equals(REPLY)).toBe(true);

    const clientClosed = new Promise<void>(resolve => client.once('close', () => resolve()));
    await expect(transport.close()).resolves.toBeUndefined();
    await clientClosed;
  });

  it('tcpout exchanges bytes with the remote server', async () => {
    const server = net.createServer();
    const accepted = new Promise<net.Socket>(resolve => server.once('connection', resolve));
    const port = await listen(server);

    const transport = await openTransport({ kind: 'tcpout', host: '127.0.0.1', port });
    expect(transport.description).toBe(`tcpout://127.0.0.1:${port}`);
    const peer = await accepted;

    const chunk = nextChunk(transport);
    peer.write(FRAME);
    expect((await chunk).equals(FRAME)).toBe(true);

    const received = new Promise<Buffer>(resolve => peer.once('data', resolve));
    transport.send(REPLY);
    expect((await received).equals(REPLY)).toBe(true);
    expect(transport.localAddress()?.address).toBe('127.0.0.1');

    await expect(transport.close()).resolves.toBeUndefined();
    peer.destroy();
    await closeServer(server);
  });

  it('tcpout reports a refused connection', async () => {
    const server = net.createServer();
    const port = await listen(server);
    await closeServer(server);

    const error = await openTransport({ kind: 'tcpout', host: '127.0.0.1', port }).catch(
      (err: unknown) => err
    );

    expect(error).toBeInstanceOf(ConnectionError);
    expect(error).toHaveProperty(
      'message',
      expect.stringMatching(new RegExp(`^tcpout://127\\.0\\.0\\.1:${port}: `))
    );
  });
});

describe('udp transports', () => {
  const sockets: dgram.Socket[] = [];

  function createPeer(): dgram.Socket {
    const socket = dgram.createSocket('udp4');
    sockets.push(socket);
    return socket;
  }

  afterEach(() => {
    for (const socket of sockets.splice(0)) {
      socket.close();
    }
  });

  it('udpin learns its peer from the first datagram', async () => {
    const transport = await openTransport({ kind: 'udpin', host: '127.0.0.1', port: 0 });
    const port = boundPort(transport);
    const peer = createPeer();
    const peerPort = await bindUdp(peer);

    transport.send(REPLY);
    const chunk = nextChunk(transport);
    peer.send(FRAME, port, '127.0.0.1');
    expect((await chunk).equals(FRAME)).toBe(true);

    const reply = nextDatagram(peer);
    transport.send(REPLY);
    const received = await reply;
    expect(received.chunk.equals(REPLY)).toBe(true);
    expect(received.port).toBe(port);
    expect(peerPort).toBeGreaterThan(0);

    await expect(transport.close()).resolves.toBeUndefined();
    expect(transport.localAddress()).toBeNull();
  });

  it('udpout sends to the remote and forwards its datagrams', async () => {
    const peer = createPeer();
    const peerPort = await bindUdp(peer);
    const transport = await openTransport({ kind: 'udpout', host: '127.0.0.1', port: peerPort });

    const datagram = nextDatagram(peer);
    transport.send(REPLY);
    const received = await datagram;
    expect(received.chunk.equals(REPLY)).toBe(true);
    expect(received.port).toBe(boundPort(transport));

    const chunk = nextChunk(transport);
    peer.send(FRAME, received.port, '127.0.0.1');
    expect((await chunk).equals(FRAME)).toBe(true);

    await expect(transport.close()).resolves.toBeUndefined();
    await expect(transport.close()).resolves.toBeUndefined();
  });
});
