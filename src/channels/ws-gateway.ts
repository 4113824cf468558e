/**
 * WebSocket 网关
 *
 * - HTTP 服务器：GET /health 返回存活状态与连接数，其余路径 404
 * - WebSocket：只在 wsPath 上接受升级；升级前完成握手校验
 *
 * 连接流程：
 * 1. 客户端请求 ws://host:port/ws?token=<JWT>&session_id=<可选>
 *    （token 也可放在 Authorization: Bearer 头中）
 * 2. 网关调用 ProtocolHandler.handshake()，失败则完成升级后立即以 1008 关闭
 * 3. 成功后把 'message' 事件转为 AsyncQueue，交给 ProtocolHandler.serve() 逐条处理
 * 4. 'close' 事件关闭队列并触发 abort，处理器注销连接
 *
 * 停止时先拒绝新的升级，再以 1001 关闭全部连接；宽限期内未结束的连接被强制断开。
 */

import { createServer, type Server, type IncomingMessage, type ServerResponse } from 'node:http';
import type { AddressInfo } from 'node:net';
import type { Duplex } from 'node:stream';
import { randomUUID } from 'node:crypto';
import { WebSocketServer, WebSocket, type RawData } from 'ws';
import type { ServerConfig } from '../types/config.js';
import type { Channel } from './base-channel.js';
import type { ConnectionHandle, ConnectionRegistry } from '../core/connection-registry.js';
import type { ConnectionContext, ProtocolHandler } from '../core/protocol-handler.js';
import { AsyncQueue } from '../core/async-queue.js';
import { ChannelError } from '../core/errors.js';
import { createChildLogger } from '../core/logger.js';

const log = createChildLogger('WsGateway');

/** 服务器关闭时使用的关闭码 */
const CLOSE_GOING_AWAY = 1001;
const CLOSE_GOING_AWAY_REASON = '服务器关闭';
/** 停止时等待连接任务自行结束的时长 */
const STOP_GRACE_MS = 5000;

/** 网关配置 */
export interface WsGatewayConfig {
  handler: ProtocolHandler;
  registry: ConnectionRegistry;
  server: ServerConfig;
}

/**
 * ws 连接句柄
 */
export class WsConnection implements ConnectionHandle {
  readonly id = randomUUID();

  constructor(private readonly socket: WebSocket) {}

  get isOpen(): boolean {
    return this.socket.readyState === WebSocket.OPEN;
  }

  send(payload: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.socket.send(payload, (err) => {
        if (err) {
          reject(err);
        } else {
          resolve();
        }
      });
    });
  }

  close(code: number, reason: string): void {
    this.socket.close(code, reason);
  }
}

/** 把 ws 收到的原始数据解码为文本 */
function decodeRawData(data: RawData): string {
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8');
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  return Buffer.from(data).toString('utf8');
}

/** 读取 Authorization: Bearer 头 */
function bearerToken(header: string | undefined): string | undefined {
  const match = header?.match(/^Bearer\s+(.+)$/i);
  return match?.[1]?.trim() || undefined;
}

/** 拒绝一个尚未升级的 socket */
function rejectUpgrade(socket: Duplex, status: string): void {
  socket.once('finish', () => socket.destroy());
  socket.end(`HTTP/1.1 ${status}\r\nConnection: close\r\n\r\n`);
}

/**
 * WebSocket 网关实现
 */
export class WsGateway implements Channel {
  readonly name = 'websocket';

  private readonly handler: ProtocolHandler;
  private readonly registry: ConnectionRegistry;
  private readonly server: ServerConfig;
  private httpServer: Server | null = null;
  private wsServer: WebSocketServer | null = null;
  /** 正在服务的连接任务 */
  private readonly active = new Set<Promise<void>>();
  private stopping = false;

  constructor(config: WsGatewayConfig) {
    this.handler = config.handler;
    this.registry = config.registry;
    this.server = config.server;
  }

  /** 实际监听地址（未启动时为 null） */
  get address(): AddressInfo | null {
    const address = this.httpServer?.address();
    return address && typeof address === 'object' ? address : null;
  }

  async start(): Promise<void> {
    if (this.httpServer) {
      throw new ChannelError(this.name, '网关已启动');
    }

    const wsServer = new WebSocketServer({ noServer: true, maxPayload: this.server.maxPayloadBytes });
    const httpServer = createServer((req, res) => this.handleHttpRequest(req, res));
    httpServer.on('upgrade', (req: IncomingMessage, socket: Duplex, head: Buffer) => {
      this.handleUpgrade(wsServer, req, socket, head);
    });

    await new Promise<void>((resolve, reject) => {
      httpServer.once('error', reject);
      httpServer.listen(this.server.port, this.server.host, () => {
        httpServer.off('error', reject);
        resolve();
      });
    });

    this.httpServer = httpServer;
    this.wsServer = wsServer;
    this.stopping = false;

    const address = this.address;
    log.info({ host: address?.address ?? this.server.host, port: address?.port, path: this.server.wsPath }, 'WebSocket 网关已启动');
  }

  async stop(): Promise<void> {
    this.stopping = true;

    // 先停止监听，握手中的请求在完成时会被拒绝
    const httpServer = this.httpServer;
    this.httpServer = null;
    const httpClosed = httpServer
      ? new Promise<void>((resolve, reject) => {
          httpServer.close((err) => (err ? reject(err) : resolve()));
        })
      : Promise.resolve();

    await this.registry.closeAll(CLOSE_GOING_AWAY, CLOSE_GOING_AWAY_REASON);

    const wsServer = this.wsServer;
    this.wsServer = null;
    if (wsServer) {
      for (const client of wsServer.clients) {
        if (client.readyState === WebSocket.OPEN) {
          client.close(CLOSE_GOING_AWAY, CLOSE_GOING_AWAY_REASON);
        }
      }

      let timer: NodeJS.Timeout | undefined;
      const graceElapsed = new Promise<void>((resolve) => {
        timer = setTimeout(resolve, STOP_GRACE_MS);
      });
      await Promise.race([Promise.allSettled([...this.active]), graceElapsed]);
      clearTimeout(timer);

      if (wsServer.clients.size > 0) {
        log.warn({ count: wsServer.clients.size }, '宽限期已过，强制断开剩余连接');
        for (const client of wsServer.clients) {
          client.terminate();
        }
      }
      wsServer.close();
    }

    await Promise.allSettled([...this.active]);
    await httpClosed;

    log.info('WebSocket 网关已停止');
  }

  /**
   * 处理普通 HTTP 请求
   */
  private handleHttpRequest(req: IncomingMessage, res: ServerResponse): void {
    const url = new URL(req.url ?? '/', 'http://localhost');

    if (req.method === 'GET' && url.pathname === '/health') {
      res.writeHead(200, { 'Content-Type': 'application/json; charset=utf-8' });
      res.end(JSON.stringify({ status: 'ok', connections: this.registry.totalConnections }));
      return;
    }

    res.writeHead(404, { 'Content-Type': 'application/json; charset=utf-8' });
    res.end(JSON.stringify({ error: 'not_found' }));
  }

  /**
   * 处理升级请求：先握手，再完成升级
   */
  private handleUpgrade(wsServer: WebSocketServer, req: IncomingMessage, socket: Duplex, head: Buffer): void {
    if (this.stopping) {
      rejectUpgrade(socket, '503 Service Unavailable');
      return;
    }

    const url = new URL(req.url ?? '/', 'http://localhost');
    if (url.pathname !== this.server.wsPath) {
      rejectUpgrade(socket, '404 Not Found');
      return;
    }

    const token = url.searchParams.get('token') || bearerToken(req.headers.authorization);
    const rawSessionId = url.searchParams.get('session_id');

    void this.handler
      .handshake(token, rawSessionId)
      .then((result) => {
        if (this.stopping) {
          log.debug('网关正在停止，拒绝升级');
          rejectUpgrade(socket, '503 Service Unavailable');
          return;
        }
        wsServer.handleUpgrade(req, socket, head, (ws) => {
          if (!result.ok) {
            log.info({ reason: result.reason }, '握手被拒绝');
            ws.close(result.code, result.reason);
            return;
          }
          this.attach(ws, result.context);
        });
      })
      .catch((err: unknown) => {
        log.error({ err }, '握手异常');
        rejectUpgrade(socket, '500 Internal Server Error');
      });
  }

  /**
   * 把已升级的连接交给协议处理器
   */
  private attach(ws: WebSocket, context: ConnectionContext): void {
    if (this.stopping) {
      ws.close(CLOSE_GOING_AWAY, CLOSE_GOING_AWAY_REASON);
      return;
    }

    const connection = new WsConnection(ws);
    const frames = new AsyncQueue<string>();
    const controller = new AbortController();

    ws.on('message', (data: RawData) => {
      if (frames.isClosed) return;
      frames.enqueue(decodeRawData(data));
    });

    ws.on('close', (code: number) => {
      log.debug({ connId: connection.id, code }, 'WebSocket 已关闭');
      frames.close();
      controller.abort();
    });

    ws.on('error', (err: Error) => {
      log.warn({ err, connId: connection.id }, 'WebSocket 错误');
    });

    const task: Promise<void> = this.handler
      .serve(connection, context, frames, controller.signal)
      .catch((err: unknown) => {
        log.error({ err, connId: connection.id }, '连接处理异常');
      })
      .finally(() => {
        this.active.delete(task);
        if (ws.readyState === WebSocket.OPEN) {
          ws.close(1011, '服务器内部错误');
        }
      });
    this.active.add(task);
  }
}
