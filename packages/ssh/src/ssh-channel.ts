/**
 * SSH Command Channel
 *
 * Implements RemoteCommandChannel over a single ssh2 connection to the
 * global zone host. The connection is opened on first use, cached, and
 * opened again on the next call once it drops.
 */

import { basename, posix } from 'node:path'
import {
  type ExecOptions,
  type ExecResult,
  type RemoteCommandChannel,
  type UploadOptions,
  shellQuote,
} from '@zonekit/core'
import ssh2, { type Client, type ClientChannel, type SFTPWrapper } from 'ssh2'

export interface SshChannelConfig {
  /**
   * Global zone host.
   * @example 'gz01.example.test'
   */
  host: string

  /**
   * SSH port.
   * @default 22
   */
  port?: number

  /**
   * Administrative login.
   * @example 'root'
   */
  username: string

  /**
   * Private key contents (PEM or OpenSSH format).
   */
  privateKey?: string | Buffer

  /**
   * Path to an SSH agent socket. Used when no private key is given.
   * @example '/run/user/1000/ssh-agent.sock'
   */
  agent?: string

  /**
   * How long to wait for the handshake.
   * @default 20000
   */
  readyTimeoutMs?: number

  /**
   * Interval for keepalive packets; 0 disables them.
   * @default 15000
   */
  keepaliveIntervalMs?: number
}

export type SshClientFactory = () => Client

export class SshConnectionError extends Error {
  readonly code = 'SSH_CONNECTION_FAILED'
  readonly target: string

  constructor(target: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause)
    super(`SSH connection to ${target} failed: ${detail}`, { cause })
    this.name = 'SshConnectionError'
    this.target = target
  }
}

export class SshCommandChannel implements RemoteCommandChannel {
  readonly name = 'ssh'
  private config: SshChannelConfig
  private createClient: SshClientFactory
  private client: Client | null = null
  private connecting: Promise<Client> | null = null
  private dropReasons = new WeakMap<Client, Error>()

  constructor(config: SshChannelConfig, createClient: SshClientFactory = () => new ssh2.Client()) {
    this.config = config
    this.createClient = createClient
  }

  /**
   * user@host:port, for messages.
   */
  get target(): string {
    return `${this.config.username}@${this.config.host}:${this.config.port ?? 22}`
  }

  /**
   * Whether a session is currently open.
   */
  get connected(): boolean {
    return this.client !== null
  }

  async exec(command: readonly string[], options: ExecOptions = {}): Promise<ExecResult> {
    const { signal, stdin } = options
    signal?.throwIfAborted()
    const client = await this.connect()
    signal?.throwIfAborted()

    return new Promise<ExecResult>((resolve, reject) => {
      let settled = false
      let stream: ClientChannel | undefined

      const onAbort = () => {
        settle(() => reject(signal?.reason))
        stream?.close()
      }
      const onClientClose = () => {
        const reason = this.dropReasons.get(client) ?? new Error('connection closed')
        settle(() => reject(new SshConnectionError(this.target, reason)))
      }
      const settle = (fn: () => void) => {
        if (settled) return
        settled = true
        signal?.removeEventListener('abort', onAbort)
        client.removeListener('close', onClientClose)
        fn()
      }

      signal?.addEventListener('abort', onAbort, { once: true })
      client.once('close', onClientClose)

      client.exec(shellQuote(command), (err, channel) => {
        if (err) {
          settle(() => reject(err))
          return
        }
        if (settled) {
          channel.close()
          return
        }
        stream = channel

        const stdout: Buffer[] = []
        const stderr: Buffer[] = []
        let exitCode = -1

        channel.on('data', (chunk: Buffer) => stdout.push(chunk))
        channel.stderr.on('data', (chunk: Buffer) => stderr.push(chunk))
        channel.on('exit', (code: number | null) => {
          if (typeof code === 'number') exitCode = code
        })
        channel.on('close', () => {
          settle(() =>
            resolve({
              exitCode,
              stdout: Buffer.concat(stdout).toString('utf8'),
              stderr: Buffer.concat(stderr).toString('utf8'),
            }),
          )
        })

        if (stdin !== undefined) {
          channel.end(stdin)
        } else {
          channel.end()
        }
      })
    })
  }

  async upload(localPath: string, remoteDir: string, options: UploadOptions = {}): Promise<string> {
    const { signal } = options
    signal?.throwIfAborted()
    const client = await this.connect()
    const remotePath = posix.join(remoteDir, basename(localPath))

    const sftp = await new Promise<SFTPWrapper>((resolve, reject) => {
      client.sftp((err, wrapper) => (err ? reject(err) : resolve(wrapper)))
    })
    try {
      signal?.throwIfAborted()
      await new Promise<void>((resolve, reject) => {
        const onAbort = () => reject(signal?.reason)
        signal?.addEventListener('abort', onAbort, { once: true })
        sftp.fastPut(localPath, remotePath, (err) => {
          signal?.removeEventListener('abort', onAbort)
          return err ? reject(err) : resolve()
        })
      })
    } finally {
      // Ending the session also cuts short a transfer still in flight
      sftp.end()
    }
    return remotePath
  }

  async close(): Promise<void> {
    const client = this.client
    this.client = null
    client?.end()
  }

  private connect(): Promise<Client> {
    if (this.client) return Promise.resolve(this.client)
    if (this.connecting) return this.connecting

    this.connecting = new Promise<Client>((resolve, reject) => {
      const client = this.createClient()

      const onError = (err: Error) => {
        client.removeListener('ready', onReady)
        this.connecting = null
        reject(new SshConnectionError(this.target, err))
      }
      const onReady = () => {
        client.removeListener('error', onError)
        // A dropped session is forgotten; the next call connects again
        client.on('error', (err: Error) => {
          this.dropReasons.set(client, err)
          this.forget(client)
        })
        client.once('close', () => this.forget(client))
        this.client = client
        this.connecting = null
        resolve(client)
      }

      client.once('ready', onReady)
      client.once('error', onError)
      client.connect({
        host: this.config.host,
        port: this.config.port ?? 22,
        username: this.config.username,
        privateKey: this.config.privateKey,
        agent: this.config.privateKey ? undefined : this.config.agent,
        readyTimeout: this.config.readyTimeoutMs ?? 20_000,
        keepaliveInterval: this.config.keepaliveIntervalMs ?? 15_000,
      })
    })
    return this.connecting
  }

  private forget(client: Client): void {
    if (this.client === client) {
      this.client = null
      client.end()
    }
  }
}
