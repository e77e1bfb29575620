/**
 * Key Pair Provisioner
 *
 * Makes sure the credential pair used to log into zones exists on disk.
 * The pair is created once and reused by every later run; it is never
 * rotated or deleted here.
 *
 * Generation is serialised by a process-wide keyed mutex and re-checked after
 * the lock is taken, so concurrent runs never overwrite a key another run is
 * already using. Files are written to a temporary sibling and renamed into
 * place, so a reader in another process sees either no key or a whole one.
 */

import { randomBytes } from 'node:crypto'
import { access, chmod, mkdir, readFile, rename, rm, stat, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import type { Logger } from '../logger'
import ssh2 from 'ssh2'
import { type KeyedMutex, keyGenerationLock } from './mutex'

const PRIVATE_KEY_MODE = 0o600
const PUBLIC_KEY_MODE = 0o644

export interface GeneratedKeyPair {
  /** OpenSSH-format private key */
  privateKey: string
  /** authorized_keys line, without trailing newline */
  publicKeyLine: string
}

export type KeyPairGenerator = (bits: number, comment: string) => Promise<GeneratedKeyPair>

export const generateRsaKeyPair: KeyPairGenerator = (bits, comment) =>
  new Promise((resolve, reject) => {
    ssh2.utils.generateKeyPair('rsa', { bits, comment }, (err, keys) => {
      if (err) {
        reject(err)
        return
      }
      resolve({ privateKey: keys.private, publicKeyLine: keys.public.trim() })
    })
  })

export interface KeyPairProvisionerOptions {
  /**
   * @example '/work/project/.kitchen/id_rsa.pub'
   */
  publicKeyPath: string

  /**
   * @example '/work/project/.kitchen/id_rsa'
   */
  privateKeyPath: string

  /**
   * Comment appended to the public key line.
   * @example 'kitchen@ws-042'
   */
  comment: string

  /**
   * RSA modulus length.
   * @default 2048
   */
  bits?: number

  logger?: Logger

  /** Defaults to the process-wide key generation lock */
  lock?: KeyedMutex

  /** Defaults to RSA generation via node:crypto */
  generate?: KeyPairGenerator
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path)
    return true
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false
    }
    throw error
  }
}

async function writeFileAtomic(path: string, content: string, mode: number): Promise<void> {
  const tempPath = `${path}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`
  try {
    await writeFile(tempPath, content, { mode })
    // mode on writeFile is filtered by the umask
    await chmod(tempPath, mode)
    await rename(tempPath, path)
  } catch (error) {
    await rm(tempPath, { force: true })
    throw error
  }
}

export class KeyPairProvisioner {
  readonly publicKeyPath: string
  readonly privateKeyPath: string
  private comment: string
  private bits: number
  private lock: KeyedMutex
  private generate: KeyPairGenerator
  private log?: Logger

  constructor(options: KeyPairProvisionerOptions) {
    this.publicKeyPath = options.publicKeyPath
    this.privateKeyPath = options.privateKeyPath
    this.comment = options.comment
    this.bits = options.bits ?? 2048
    this.lock = options.lock ?? keyGenerationLock
    this.generate = options.generate ?? generateRsaKeyPair
    this.log = options.logger?.child({ component: 'KeyPairProvisioner' })
  }

  /**
   * Both halves of the pair are present.
   */
  async exists(): Promise<boolean> {
    const [hasPublic, hasPrivate] = await Promise.all([
      pathExists(this.publicKeyPath),
      pathExists(this.privateKeyPath),
    ])
    return hasPublic && hasPrivate
  }

  /**
   * Generate the pair if either half is missing. Idempotent.
   */
  async ensure(): Promise<void> {
    if (!(await this.exists())) {
      await this.lock.runExclusive(this.privateKeyPath, async () => {
        if (await this.exists()) {
          this.log?.debug({ path: this.privateKeyPath }, 'Key pair created by a concurrent run')
          return
        }
        await this.writeNewPair()
      })
    }
    await this.restrictPrivateKey()
  }

  /**
   * Public key line as stored, without trailing whitespace.
   */
  async readPublicKey(): Promise<string> {
    const content = await readFile(this.publicKeyPath, 'utf-8')
    return content.trim()
  }

  private async writeNewPair(): Promise<void> {
    this.log?.info(
      { publicKeyPath: this.publicKeyPath, privateKeyPath: this.privateKeyPath, bits: this.bits },
      'Generating key pair',
    )
    const pair = await this.generate(this.bits, this.comment)

    await mkdir(dirname(this.privateKeyPath), { recursive: true, mode: 0o700 })
    await mkdir(dirname(this.publicKeyPath), { recursive: true, mode: 0o700 })
    await writeFileAtomic(this.privateKeyPath, pair.privateKey, PRIVATE_KEY_MODE)
    await writeFileAtomic(this.publicKeyPath, `${pair.publicKeyLine}\n`, PUBLIC_KEY_MODE)
  }

  private async restrictPrivateKey(): Promise<void> {
    const { mode } = await stat(this.privateKeyPath)
    if ((mode & 0o077) === 0) return
    this.log?.warn(
      { path: this.privateKeyPath, mode: (mode & 0o777).toString(8) },
      'Private key readable by other users, restricting to owner',
    )
    await chmod(this.privateKeyPath, PRIVATE_KEY_MODE)
  }
}
