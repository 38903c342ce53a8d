// pattern: Imperative Shell
// Unix socket server that serves one connection at a time. Later connections
// wait, paused, until the active one finishes.

import { rm } from "node:fs/promises";
import { createServer, type Server, type Socket } from "node:net";

import { DaemonError } from "../utils/errors.js";

import { LineSession } from "./session.js";

import type { DaemonDeps } from "./protocol.js";
import type { Logger } from "pino";

export class DaemonServer {
  private server: Server | undefined;
  private readonly waiting: Socket[] = [];
  private active: Socket | undefined;
  private readonly logger: Logger;

  constructor(
    private readonly socketPath: string,
    private readonly deps: DaemonDeps
  ) {
    this.logger = deps.context.logger.child({ component: "daemon" });
  }

  get listening(): boolean {
    return this.server?.listening ?? false;
  }

  /**
   * Bind the socket, replacing any stale socket file at the same path
   */
  async start(): Promise<void> {
    if (this.server) {
      throw new DaemonError("daemon already started", this.socketPath);
    }

    await rm(this.socketPath, { force: true });

    const server = createServer(socket => this.enqueue(socket));
    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error): void => {
        reject(new DaemonError(`cannot bind socket ${this.socketPath}: ${error.message}`, this.socketPath));
      };
      server.once("error", onError);
      server.listen(this.socketPath, () => {
        server.off("error", onError);
        resolve();
      });
    });

    server.on("error", error => {
      this.logger.error({ err: error }, "Daemon server error");
    });
    this.server = server;
    this.logger.info({ socket: this.socketPath }, "Daemon listening");
  }

  /**
   * Close the listener, drop every connection and remove the socket file
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = undefined;

    for (const socket of this.waiting.splice(0)) {
      socket.destroy();
    }
    this.active?.destroy();

    await new Promise<void>(resolve => {
      server.close(error => {
        if (error) {
          this.logger.debug({ err: error }, "Daemon server was not listening");
        }
        resolve();
      });
    });
    await rm(this.socketPath, { force: true });
    this.logger.info({ socket: this.socketPath }, "Daemon stopped");
  }

  private enqueue(socket: Socket): void {
    socket.pause();
    socket.on("error", error => {
      this.logger.warn({ err: error }, "Connection error");
    });
    this.waiting.push(socket);
    if (this.waiting.length > 1 || this.active) {
      this.logger.debug({ queued: this.waiting.length }, "Connection queued");
    }
    this.serveNext();
  }

  private serveNext(): void {
    if (this.active) {
      return;
    }
    const socket = this.waiting.shift();
    if (!socket) {
      return;
    }

    this.active = socket;
    this.logger.info("Connection opened");

    void new LineSession(socket, socket, this.deps)
      .run()
      .then(
        reason => {
          this.logger.info({ reason }, "Connection closed");
        },
        (error: unknown) => {
          this.logger.warn({ err: error }, "Connection ended with an error");
        }
      )
      .finally(() => {
        socket.end();
        this.active = undefined;
        this.serveNext();
      });
  }
}
