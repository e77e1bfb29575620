/**
 * Remote Command Channel Interface
 *
 * Abstracts the single administrative session to the global zone host:
 * - SSH (via ssh2), implemented by @zonekit/ssh
 * - In-process fakes for tests
 *
 * The lifecycle works against this interface only, so transport identity
 * (host, credentials) stays with whoever constructs the channel.
 */

/**
 * Outcome of one remote command.
 * A non-zero exit code is reported here, never thrown.
 */
export interface ExecResult {
  /**
   * Exit status of the remote command. -1 when the command ended without one
   * (killed by a signal, channel closed early).
   * @example 0
   */
  exitCode: number

  /** Captured standard output. */
  stdout: string

  /** Captured standard error. */
  stderr: string
}

/**
 * Per-call options for exec.
 */
export interface ExecOptions {
  /**
   * Text written to the command's standard input, which is then closed.
   * @example 'rdr net0 0.0.0.0/0 port 42022 -> 10.0.0.5 port 22\n'
   */
  stdin?: string

  /**
   * Abandons the wait when aborted. The remote process may keep running.
   */
  signal?: AbortSignal
}

/**
 * Per-call options for upload.
 */
export interface UploadOptions {
  /**
   * Ends the transfer when aborted; a partial remote file may remain.
   */
  signal?: AbortSignal
}

/**
 * Remote Command Channel.
 *
 * Implementations:
 * - SshCommandChannel: one cached ssh2 connection, re-established on next use if dropped
 */
export interface RemoteCommandChannel {
  /**
   * Channel name for logging/debugging.
   * @example 'ssh'
   */
  readonly name: string

  /**
   * Run one command and wait for it to finish.
   * @param command Program and arguments; quoted by the channel, never re-split
   */
  exec(command: readonly string[], options?: ExecOptions): Promise<ExecResult>

  /**
   * Copy a local file into a remote directory, keeping its base name.
   * @returns Remote path of the uploaded file
   */
  upload(localPath: string, remoteDir: string, options?: UploadOptions): Promise<string>

  /**
   * End the session. A later exec or upload connects again.
   */
  close(): Promise<void>
}

const SAFE_WORD = /^[A-Za-z0-9_@%+=:,./-]+$/

/**
 * Quote one argument for a POSIX shell.
 */
export function shellQuoteArg(arg: string): string {
  if (arg === '') return "''"
  if (SAFE_WORD.test(arg)) return arg
  return `'${arg.replace(/'/g, `'\\''`)}'`
}

/**
 * Join an argument vector into a command line a POSIX shell splits back into
 * exactly the same arguments.
 */
export function shellQuote(command: readonly string[]): string {
  return command.map(shellQuoteArg).join(' ')
}
