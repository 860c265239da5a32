/**
 * Serve mode: every SSH client with a pty gets its own viewer session.
 *
 * Any authentication is accepted. A shell request without a pty, and any
 * exec request, is refused with a message and exit status 1. Connections
 * beyond the session limit are told so and closed.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import ssh2, { type Connection, type Server, type ServerChannel } from "ssh2";
import { type Logger, errorMessage } from "termfolio-core";
import type { Screen } from "termfolio-tui";
import type { PortfolioApp } from "../ui/app.js";
import { SessionRegistry, ViewerSession } from "./session.js";

export const NO_PTY_MESSAGE = "no active terminal, skipping";
export const SERVER_FULL_MESSAGE = "too many viewers right now, try again later";

export interface SshServerOptions {
  host: string;
  port: number;
  hostKeyPath: string;
  maxSessions: number;
  clock: boolean;
  /** Build a fresh engine for each viewer. */
  createApp: () => PortfolioApp;
  logger: Logger;
}

interface Geometry {
  cols: number;
  rows: number;
}

/** Read the host key, generating an ed25519 key at `path` when there is none. */
export function loadHostKey(path: string, log: Logger): Buffer {
  if (existsSync(path)) return readFileSync(path);

  const pair = ssh2.utils.generateKeyPairSync("ed25519");
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, pair.private, { mode: 0o600 });
  log.info(`Generated host key at ${path}`);
  return Buffer.from(pair.private);
}

function refuse(stream: ServerChannel, message: string): void {
  stream.write(`${message}\r\n`);
  stream.exit(1);
  stream.end();
}

export class PortfolioSshServer {
  private readonly server: Server;
  private readonly registry: SessionRegistry;
  private readonly log: Logger;
  private nextId = 1;

  constructor(private readonly options: SshServerOptions) {
    this.log = options.logger.child("ssh");
    this.registry = new SessionRegistry(options.maxSessions);

    const hostKey = loadHostKey(options.hostKeyPath, this.log);
    this.server = new ssh2.Server({ hostKeys: [hostKey] }, (client, info) =>
      this.onClient(client, `${info.ip}:${info.port}#${this.nextId++}`)
    );
  }

  get sessionCount(): number {
    return this.registry.size;
  }

  /** The bound port once listening, else the configured one. */
  get port(): number {
    const address = this.server.address();
    return address !== null && typeof address === "object" ? address.port : this.options.port;
  }

  listen(): Promise<void> {
    const { host, port } = this.options;
    return new Promise((resolve, reject) => {
      this.server.once("error", reject);
      this.server.listen(port, host, () => {
        this.server.off("error", reject);
        this.server.on("error", (err: Error) => this.log.error(`Server error: ${err.message}`));
        this.log.info(`Listening on ${host}:${this.port}`);
        resolve();
      });
    });
  }

  /** Close every session, then stop accepting connections. */
  close(): Promise<void> {
    this.registry.closeAll();
    return new Promise((resolve) => {
      this.server.close(() => resolve());
    });
  }

  // ── Connections ─────────────────────────────────────────────────────

  private onClient(client: Connection, label: string): void {
    this.log.debug(`Connection from ${label}`);

    client.on("authentication", (ctx) => ctx.accept());
    client.on("ready", () => {
      client.on("session", (accept) => {
        const session = accept();
        const geometry: Geometry = { cols: 0, rows: 0 };
        let hasPty = false;
        let viewer: ViewerSession | null = null;

        session.on("pty", (acceptPty, _reject, info) => {
          hasPty = true;
          geometry.cols = info.cols;
          geometry.rows = info.rows;
          acceptPty?.();
        });

        session.on("window-change", (acceptChange, _reject, info) => {
          geometry.cols = info.cols;
          geometry.rows = info.rows;
          acceptChange?.();
          viewer?.resize(info.cols, info.rows);
        });

        session.on("shell", (acceptShell) => {
          const stream = acceptShell();
          if (!hasPty) {
            this.log.info(`${label}: shell without a pty refused`);
            refuse(stream, NO_PTY_MESSAGE);
            return;
          }
          viewer = this.startViewer(stream, geometry, label);
        });

        session.on("exec", (acceptExec) => {
          this.log.info(`${label}: exec refused`);
          refuse(acceptExec(), NO_PTY_MESSAGE);
        });
      });
    });

    client.on("error", (err) => this.log.warn(`${label}: ${errorMessage(err)}`));
    client.on("close", () => this.log.debug(`${label} disconnected`));
  }

  private startViewer(stream: ServerChannel, geometry: Geometry, label: string): ViewerSession | null {
    if (this.registry.isFull) {
      this.log.warn(`${label}: refused, ${this.registry.size} sessions open`);
      refuse(stream, SERVER_FULL_MESSAGE);
      return null;
    }

    const screen: Screen = {
      write: (data) => {
        if (stream.writable) stream.write(data);
      },
      get columns() {
        return geometry.cols;
      },
      get rows() {
        return geometry.rows;
      },
    };

    const viewer = new ViewerSession({
      label,
      app: this.options.createApp(),
      screen,
      clock: this.options.clock,
      logger: this.log,
      onClose: (closed) => {
        this.registry.remove(closed);
        if (stream.writable) {
          stream.exit(0);
          stream.end();
        }
      },
    });
    this.registry.add(viewer);

    stream.on("data", (data: Buffer) => viewer.input(data.toString("utf8")));
    stream.on("error", (err: Error) => {
      this.log.warn(`${label}: channel error: ${err.message}`);
      viewer.close("error");
    });
    stream.on("close", () => viewer.close("disconnect"));

    viewer.start();
    return viewer;
  }
}
