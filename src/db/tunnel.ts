/**
 * SSH tunnels to databases that are not directly reachable.
 *
 * One ssh2 client per tunnel; every local connection is forwarded over it.
 * The local end depends on the platform: POSIX hosts get a Unix socket that
 * pg connects to as a socket directory, Windows hosts get an ephemeral TCP
 * port on the loopback interface.
 */

import { mkdtemp, rm } from "node:fs/promises";
import { createServer, type Server, type Socket } from "node:net";
import { tmpdir } from "node:os";
import { join } from "node:path";

import ssh2 from "ssh2";

import { errorMessage, TransientError } from "../errors.js";
import { sourceLogger } from "../logger.js";

import type { TunnelConfig } from "../types/index.js";

const { Client } = ssh2;

// ============================================================================
// Types
// ============================================================================

export interface TunnelTarget {
  host: string;
  port: number;
}

/** Where pg should connect once the tunnel is open */
export interface TunnelEndpoint {
  host: string;
  port: number;
}

export interface SecureTunnel {
  open(): Promise<TunnelEndpoint>;
  close(): Promise<void>;
}

type SshClient = InstanceType<typeof Client>;

const READY_TIMEOUT_MS = 20_000;

// ============================================================================
// Base tunnel
// ============================================================================

abstract class SshForwardTunnel implements SecureTunnel {
  private client: SshClient | null = null;
  private server: Server | null = null;

  constructor(
    protected readonly ssh: TunnelConfig,
    protected readonly target: TunnelTarget
  ) {}

  /** Bind the local end and return the endpoint pg should use */
  protected abstract listen(server: Server): Promise<TunnelEndpoint>;

  protected abstract cleanup(): Promise<void>;

  async open(): Promise<TunnelEndpoint> {
    const client = await this.connectClient();
    const server = createServer((socket) => {
      this.forward(client, socket);
    });

    this.client = client;
    this.server = server;

    try {
      const endpoint = await this.listen(server);
      sourceLogger.info(
        {
          sshHost: this.ssh.host,
          target: `${this.target.host}:${String(this.target.port)}`,
          localHost: endpoint.host,
          localPort: endpoint.port,
          kind: this.constructor.name,
        },
        "SSH tunnel opened"
      );
      return endpoint;
    } catch (error) {
      await this.close();
      throw error;
    }
  }

  async close(): Promise<void> {
    const server = this.server;
    const client = this.client;
    this.server = null;
    this.client = null;

    if (server !== null) {
      await new Promise<void>((resolve) => {
        server.close(() => {
          resolve();
        });
      });
    }
    client?.end();
    await this.cleanup();

    if (server !== null || client !== null) {
      sourceLogger.info({ sshHost: this.ssh.host }, "SSH tunnel closed");
    }
  }

  private connectClient(): Promise<SshClient> {
    return new Promise<SshClient>((resolve, reject) => {
      const client = new Client();
      let ready = false;
      client
        .once("ready", () => {
          ready = true;
          resolve(client);
        })
        // Attached for the client's lifetime
        .on("error", (error: Error) => {
          if (ready) {
            sourceLogger.warn(
              { sshHost: this.ssh.host, error: error.message },
              "SSH connection error"
            );
            return;
          }
          reject(
            new TransientError(
              `SSH connection to ${this.ssh.host} failed: ${error.message}`,
              { cause: error }
            )
          );
        })
        .connect({
          host: this.ssh.host,
          port: this.ssh.port,
          username: this.ssh.user,
          password: this.ssh.password,
          readyTimeout: READY_TIMEOUT_MS,
        });
    });
  }

  private forward(client: SshClient, socket: Socket): void {
    socket.on("error", (error) => {
      sourceLogger.debug(
        { error: error.message },
        "Tunnel local socket error"
      );
    });

    client.forwardOut(
      socket.remoteAddress ?? "127.0.0.1",
      socket.remotePort ?? 0,
      this.target.host,
      this.target.port,
      (error, stream) => {
        if (error !== undefined && error !== null) {
          sourceLogger.error(
            { error: errorMessage(error) },
            "Tunnel forwarding failed"
          );
          socket.destroy();
          return;
        }
        stream.on("error", (streamError: Error) => {
          sourceLogger.debug(
            { error: streamError.message },
            "Tunnel remote stream error"
          );
        });
        socket.pipe(stream).pipe(socket);
      }
    );
  }
}

// ============================================================================
// Platform implementations
// ============================================================================

/**
 * Local end on a Unix socket named the way libpq expects (`.s.PGSQL.<port>`)
 */
export class UnixSocketTunnel extends SshForwardTunnel {
  private socketDir: string | null = null;

  protected async listen(server: Server): Promise<TunnelEndpoint> {
    const socketDir = await mkdtemp(join(tmpdir(), "sheets-sync-"));
    this.socketDir = socketDir;
    const socketPath = join(socketDir, `.s.PGSQL.${String(this.target.port)}`);

    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(socketPath, () => {
        server.off("error", reject);
        resolve();
      });
    });

    return { host: socketDir, port: this.target.port };
  }

  protected async cleanup(): Promise<void> {
    if (this.socketDir !== null) {
      await rm(this.socketDir, { recursive: true, force: true });
      this.socketDir = null;
    }
  }
}

/**
 * Local end on an ephemeral loopback TCP port
 */
export class TcpTunnel extends SshForwardTunnel {
  protected async listen(server: Server): Promise<TunnelEndpoint> {
    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(0, "127.0.0.1", () => {
        server.off("error", reject);
        resolve();
      });
    });

    const address = server.address();
    if (address === null || typeof address === "string") {
      throw new Error("Tunnel listener did not bind a TCP port");
    }
    return { host: "127.0.0.1", port: address.port };
  }

  protected cleanup(): Promise<void> {
    return Promise.resolve();
  }
}

/**
 * Pick the tunnel implementation for the running platform
 */
export function createTunnel(
  ssh: TunnelConfig,
  target: TunnelTarget,
  platform: NodeJS.Platform = process.platform
): SecureTunnel {
  if (platform === "win32") {
    return new TcpTunnel(ssh, target);
  }
  return new UnixSocketTunnel(ssh, target);
}
