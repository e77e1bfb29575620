/**
 * Zone Lifecycle Tests
 *
 * Drives create/destroy against an in-memory channel; no host required.
 */

import { mkdtemp, readdir, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import type { RunState } from '@zonekit/core'
import { afterEach, beforeAll, beforeEach, describe, expect, test, vi } from 'vitest'
import { FakeChannel } from '../../test/fake-channel'
import { createResolvedConfig } from '../../test/fixtures'
import { type ArtifactTemplates, ArtifactRenderer, loadTemplates } from '../artifacts'
import { BUNDLED_TEMPLATES_DIR } from '../config'
import {
  ArtifactValidationError,
  NetworkTimeoutError,
  RemoteCommandError,
  ZoneNameError,
} from '../errors'
import { type ZoneLifecycleOptions, ZoneLifecycle } from './lifecycle'

const REMOTE_DIR = '/systems/zones/zonekit_tmp/tmp.Xy12'
const SHOW_ADDR_PENDING = 'net0/v4           dhcp     tentative    ?\n'
const SHOW_ADDR_BOUND = 'net0/v4           dhcp     ok           10.0.0.5/24\n'
const PUBLIC_KEY = 'ssh-rsa AAAAtest kitchen@ws1'

const noSleep = async () => {}

let templates: ArtifactTemplates
let stagingDir: string

beforeAll(async () => {
  templates = await loadTemplates(BUNDLED_TEMPLATES_DIR)
})

beforeEach(async () => {
  stagingDir = await mkdtemp(join(tmpdir(), 'zonekit-lifecycle-'))
})

afterEach(async () => {
  await rm(stagingDir, { recursive: true, force: true })
})

/** Host that answers mktemp and reports a bound address on the first probe */
function hostChannel(): FakeChannel {
  return new FakeChannel()
    .on(/^mktemp /, { stdout: `${REMOTE_DIR}\n` })
    .on(/ipadm show-addr/, { stdout: SHOW_ADDR_BOUND })
}

function createLifecycle(
  channel: FakeChannel,
  overrides: Record<string, unknown> = {},
  options: Partial<ZoneLifecycleOptions> = {},
) {
  const config = createResolvedConfig(
    {
      global_zone_host: 'gz01.example.test',
      zone_port: 42022,
      network_poll_interval: 0,
      ...overrides,
    },
    { instanceName: 'demo', tmpDir: stagingDir },
  )
  const credentials = {
    ensure: vi.fn(async () => {}),
    readPublicKey: vi.fn(async () => PUBLIC_KEY),
  }
  const lifecycle = new ZoneLifecycle({
    config,
    channel,
    credentials,
    renderer: new ArtifactRenderer(templates),
    sleep: noSleep,
    randomBytes: () => Buffer.from('ab12cd34', 'hex'),
    ...options,
  })
  return { lifecycle, credentials, config }
}

// =============================================================================
// create
// =============================================================================

describe('ZoneLifecycle.create', () => {
  test('stages artifacts, boots the zone and forwards a port', async () => {
    const channel = hostChannel()
    const { lifecycle, credentials } = createLifecycle(channel, { zone_template: 'base' })

    const state: RunState = {}
    const result = await lifecycle.create(state)

    expect(result).toBe(state)
    expect(credentials.ensure).toHaveBeenCalledTimes(1)
    expect(channel.lines).toEqual([
      'mkdir -p /systems/zones/zonekit_tmp',
      'mktemp -d -p /systems/zones/zonekit_tmp',
      `/usr/sbin/zonecfg -z demo-ab12cd34 -f ${REMOTE_DIR}/demo-ab12cd34.cfg`,
      `/usr/sbin/zoneadm -z demo-ab12cd34 clone -c ${REMOTE_DIR}/demo-ab12cd34_profile.xml base`,
      '/usr/sbin/zoneadm -z demo-ab12cd34 boot',
      `rm -rf ${REMOTE_DIR}`,
      '/usr/sbin/zlogin demo-ab12cd34 ipadm show-addr',
      '/usr/sbin/ipnat -f -',
    ])
    expect(channel.execs.at(-1)?.stdin).toBe('rdr net0 0.0.0.0/0 port 42022 -> 10.0.0.5 port 22\n')
    expect(state).toEqual({
      phase: 'NetworkReady',
      zoneName: 'demo-ab12cd34',
      zoneIp: '10.0.0.5',
      zonePort: 42022,
      hostname: 'gz01.example.test',
      port: 42022,
      username: 'kitchen',
    })
  })

  test('uploads rendered artifacts named after the zone', async () => {
    const channel = hostChannel()
    const { lifecycle } = createLifecycle(channel)

    await lifecycle.create()

    expect(channel.uploads.map((u) => u.remotePath)).toEqual([
      `${REMOTE_DIR}/demo-ab12cd34.cfg`,
      `${REMOTE_DIR}/demo-ab12cd34_profile.xml`,
    ])
    const [zoneConfig, profile] = channel.uploads.map((u) => u.content)
    expect(zoneConfig.split('\n')).toContain('set zonepath=/systems/zones/demo-ab12cd34')
    expect(zoneConfig.split('\n')).toContain('set lower-link=kitchenstub0')
    expect(profile).toContain(`<value_node value="${PUBLIC_KEY}"/>`)
    expect(profile).toContain('<propval type="astring" name="nodename" value="demo-ab12cd34"/>')
  })

  test('removes local artifacts after staging', async () => {
    const { lifecycle } = createLifecycle(hostChannel())

    await lifecycle.create()

    expect(await readdir(stagingDir)).toEqual([])
  })

  test('keep_config retains local and remote artifacts', async () => {
    const channel = hostChannel()
    const { lifecycle } = createLifecycle(channel, { keep_config: true })

    await lifecycle.create()

    expect(channel.count(/^rm -rf/)).toBe(0)
    const [kept] = await readdir(stagingDir)
    expect((await readdir(join(stagingDir, kept))).sort()).toEqual([
      'demo-ab12cd34.cfg',
      'demo-ab12cd34_profile.xml',
    ])
  })

  test('uses an explicit zone name as given', async () => {
    const channel = hostChannel()
    const { lifecycle } = createLifecycle(channel, { zone_name: 'ci-zone-1' })

    const state = await lifecycle.create()

    expect(state.zoneName).toBe('ci-zone-1')
    expect(channel.lines).toContain('/usr/sbin/zoneadm -z ci-zone-1 boot')
  })

  test('rejects an invalid explicit zone name before touching the host', async () => {
    const channel = hostChannel()
    const { lifecycle } = createLifecycle(channel, { zone_name: 'SUNWbad' })

    await expect(lifecycle.create()).rejects.toBeInstanceOf(ZoneNameError)
    expect(channel.lines).toEqual([])
  })

  test('reports the transport host when configured', async () => {
    const { lifecycle } = createLifecycle(hostChannel(), { transport_host: 'nat.example.test' })

    const state = await lifecycle.create()

    expect(lifecycle.endpoint(state)).toEqual({
      hostname: 'nat.example.test',
      port: 42022,
      username: 'kitchen',
      zoneName: 'demo-ab12cd34',
    })
  })

  test('stops before the host when key provisioning fails', async () => {
    const channel = hostChannel()
    const { lifecycle, credentials } = createLifecycle(channel)
    credentials.ensure.mockRejectedValueOnce(new Error('disk full'))

    const state: RunState = {}
    await expect(lifecycle.create(state)).rejects.toThrow('disk full')
    expect(channel.lines).toEqual([])
    expect(state).toEqual({})
  })

  test('stops before the host when an artifact cannot be rendered', async () => {
    const channel = hostChannel()
    const { lifecycle } = createLifecycle(channel, { zone_comment: 'say "hi"' })

    await expect(lifecycle.create()).rejects.toBeInstanceOf(ArtifactValidationError)
    expect(channel.lines).toEqual([])
  })

  test('fails when mktemp prints no directory', async () => {
    const channel = hostChannel().on(/^mktemp /, { stdout: '\n' })
    const { lifecycle } = createLifecycle(channel)

    const state: RunState = {}
    await expect(lifecycle.create(state)).rejects.toBeInstanceOf(RemoteCommandError)
    expect(channel.lines).toEqual(['mkdir -p /systems/zones/zonekit_tmp', 'mktemp -d -p /systems/zones/zonekit_tmp'])
    expect(state).toEqual({ phase: 'KeysReady' })
  })
})

// =============================================================================
// create: failures and partial state
// =============================================================================

describe('ZoneLifecycle.create failures', () => {
  test('a failing zonecfg stops the sequence and still cleans the staging directory', async () => {
    const channel = hostChannel().on(/zonecfg -z \S+ -f/, {
      exitCode: 1,
      stderr: 'zonecfg: invalid zonepath\n',
    })
    const { lifecycle } = createLifecycle(channel)

    const state: RunState = {}
    const error = await lifecycle.create(state).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(RemoteCommandError)
    expect(error).toMatchObject({
      message: `Remote command failed (exit 1): /usr/sbin/zonecfg -z demo-ab12cd34 -f ${REMOTE_DIR}/demo-ab12cd34.cfg: zonecfg: invalid zonepath`,
    })
    expect(channel.count(/zoneadm/)).toBe(0)
    expect(channel.lines.at(-1)).toBe(`rm -rf ${REMOTE_DIR}`)
    expect(state).toEqual({ phase: 'ArtifactsStaged', zoneName: 'demo-ab12cd34' })
  })

  test('a failing boot leaves the zone recorded for destroy', async () => {
    const channel = hostChannel().on(/ boot$/, { exitCode: 1, stderr: 'boot failed' })
    const { lifecycle } = createLifecycle(channel)

    const state: RunState = {}
    await expect(lifecycle.create(state)).rejects.toBeInstanceOf(RemoteCommandError)
    expect(state).toEqual({ phase: 'ZoneCloned', zoneName: 'demo-ab12cd34' })

    const before = channel.lines.length
    await lifecycle.destroy(state)
    expect(channel.lines.slice(before)).toEqual([
      '/usr/sbin/zoneadm -z demo-ab12cd34 halt',
      '/usr/sbin/zoneadm -z demo-ab12cd34 uninstall -F',
      '/usr/sbin/zonecfg -z demo-ab12cd34 delete -F',
    ])
    expect(state).toEqual({ phase: 'Idle' })
  })

  test('a failing cleanup does not replace the original error', async () => {
    const channel = hostChannel()
      .on(/zoneadm -z \S+ clone/, { exitCode: 1, stderr: 'no such template' })
      .on(/^rm -rf/, new Error('channel reset'))
    const { lifecycle } = createLifecycle(channel)

    await expect(lifecycle.create()).rejects.toThrow('no such template')
  })

  test('a failing cleanup does not fail a successful create', async () => {
    const channel = hostChannel().on(/^rm -rf/, { exitCode: 1, stderr: 'busy' })
    const { lifecycle } = createLifecycle(channel)

    const state = await lifecycle.create()

    expect(state.phase).toBe('NetworkReady')
  })

  test('times out when the zone never gets an address', async () => {
    const channel = hostChannel().on(/ipadm show-addr/, { stdout: SHOW_ADDR_PENDING })
    const { lifecycle } = createLifecycle(channel, { network_max_attempts: 3 })

    const state: RunState = {}
    await expect(lifecycle.create(state)).rejects.toBeInstanceOf(NetworkTimeoutError)
    expect(channel.count(/ipadm show-addr/)).toBe(3)
    expect(channel.count(/ipnat/)).toBe(0)
    expect(state).toEqual({ phase: 'NetworkPending', zoneName: 'demo-ab12cd34' })
  })

  test('polls until the address appears', async () => {
    const channel = hostChannel().on(/ipadm show-addr/, (_line, call) => ({
      stdout: call <= 2 ? SHOW_ADDR_PENDING : SHOW_ADDR_BOUND,
    }))
    const { lifecycle } = createLifecycle(channel)

    const state = await lifecycle.create()

    expect(channel.count(/ipadm show-addr/)).toBe(3)
    expect(state.zoneIp).toBe('10.0.0.5')
  })
})

// =============================================================================
// create: cancellation
// =============================================================================

describe('ZoneLifecycle.create cancellation', () => {
  test('aborting during the network wait tears the zone down', async () => {
    const controller = new AbortController()
    const channel = hostChannel().on(/ipadm show-addr/, (_line, call) => {
      if (call === 2) controller.abort(new Error('cancelled'))
      return { stdout: SHOW_ADDR_PENDING }
    })
    const { lifecycle } = createLifecycle(channel)

    const state: RunState = {}
    await expect(lifecycle.create(state, { signal: controller.signal })).rejects.toThrow('cancelled')

    expect(channel.count(/ipadm show-addr/)).toBe(2)
    expect(channel.lines.slice(-3)).toEqual([
      '/usr/sbin/zoneadm -z demo-ab12cd34 halt',
      '/usr/sbin/zoneadm -z demo-ab12cd34 uninstall -F',
      '/usr/sbin/zonecfg -z demo-ab12cd34 delete -F',
    ])
    expect(state).toEqual({ phase: 'Idle' })
  })

  test('an already aborted signal does nothing remotely', async () => {
    const channel = hostChannel()
    const { lifecycle, credentials } = createLifecycle(channel)
    const controller = new AbortController()
    controller.abort(new Error('cancelled'))

    const state: RunState = {}
    await expect(lifecycle.create(state, { signal: controller.signal })).rejects.toThrow('cancelled')
    expect(credentials.ensure).not.toHaveBeenCalled()
    expect(channel.lines).toEqual([])
    expect(state).toEqual({ phase: 'Idle' })
  })
})

// =============================================================================
// Port selection
// =============================================================================

describe('forwarded port selection', () => {
  test('picks a random port not already redirected', async () => {
    const channel = hostChannel().on(/ipnat -l/, {
      stdout: 'rdr net0 0.0.0.0/0 port 40000 -> 10.0.0.9 port 22 tcp\n',
    })
    const picks = [40000, 40001]
    const { lifecycle } = createLifecycle(
      channel,
      { zone_port: undefined },
      { randomPort: () => picks.shift() ?? 0 },
    )

    const state = await lifecycle.create()

    expect(state.zonePort).toBe(40001)
    expect(state.port).toBe(40001)
    expect(channel.lines.slice(-2)).toEqual(['/usr/sbin/ipnat -l', '/usr/sbin/ipnat -f -'])
    expect(channel.execs.at(-1)?.stdin).toBe('rdr net0 0.0.0.0/0 port 40001 -> 10.0.0.5 port 22\n')
  })

  test('treats a failed rule listing as no rules', async () => {
    const channel = hostChannel().on(/ipnat -l/, new Error('permission denied'))
    const { lifecycle } = createLifecycle(
      channel,
      { zone_port: undefined },
      { randomPort: () => 40000 },
    )

    const state = await lifecycle.create()

    expect(state.zonePort).toBe(40000)
  })

  test('targets the configured service port and interface', async () => {
    const channel = hostChannel().on(/ipadm show-addr/, {
      stdout: 'net1/v4           dhcp     ok           10.0.1.8/24\n',
    })
    const { lifecycle } = createLifecycle(channel, { zone_interface: 'net1', zone_service_port: 2222 })

    await lifecycle.create()

    expect(channel.execs.at(-1)?.stdin).toBe('rdr net1 0.0.0.0/0 port 42022 -> 10.0.1.8 port 2222\n')
  })
})

// =============================================================================
// destroy
// =============================================================================

describe('ZoneLifecycle.destroy', () => {
  test('create then destroy leaves nothing recorded', async () => {
    const channel = hostChannel()
    const { lifecycle } = createLifecycle(channel)

    const state = await lifecycle.create()
    const before = channel.lines.length
    const report = await lifecycle.destroy(state)

    expect(channel.execs.slice(before)).toEqual([
      { line: '/usr/sbin/ipnat -r -f -', stdin: 'rdr net0 0.0.0.0/0 port 42022 -> 10.0.0.5 port 22\n' },
      { line: '/usr/sbin/zoneadm -z demo-ab12cd34 halt' },
      { line: '/usr/sbin/zoneadm -z demo-ab12cd34 uninstall -F' },
      { line: '/usr/sbin/zonecfg -z demo-ab12cd34 delete -F' },
    ])
    expect(report.zoneName).toBe('demo-ab12cd34')
    expect(report.steps.every((step) => step.ok)).toBe(true)
    expect(state).toEqual({ phase: 'Idle' })
    expect(lifecycle.endpoint(state)).toBeNull()
  })

  test('a second destroy does nothing', async () => {
    const channel = hostChannel()
    const { lifecycle } = createLifecycle(channel)
    const state = await lifecycle.create()
    await lifecycle.destroy(state)
    const before = channel.lines.length

    const report = await lifecycle.destroy(state)

    expect(report.steps).toEqual([])
    expect(channel.lines).toHaveLength(before)
    expect(state).toEqual({ phase: 'Idle' })
  })

  test('continues past failing steps and reports each outcome', async () => {
    const channel = new FakeChannel()
      .on(/ halt$/, { exitCode: 1, stderr: 'zone not running' })
      .on(/ uninstall -F$/, new Error('channel reset'))
    const { lifecycle } = createLifecycle(channel)
    const state: RunState = {
      phase: 'NetworkReady',
      zoneName: 'web-1',
      zoneIp: '10.0.0.7',
      zonePort: 50000,
      hostname: 'gz01.example.test',
      port: 50000,
      username: 'kitchen',
    }

    const report = await lifecycle.destroy(state)

    expect(report).toEqual({
      zoneName: 'web-1',
      steps: [
        { step: 'nat', command: '/usr/sbin/ipnat -r -f -', ok: true, exitCode: 0 },
        { step: 'halt', command: '/usr/sbin/zoneadm -z web-1 halt', ok: false, exitCode: 1 },
        { step: 'uninstall', command: '/usr/sbin/zoneadm -z web-1 uninstall -F', ok: false, error: 'channel reset' },
        { step: 'delete', command: '/usr/sbin/zonecfg -z web-1 delete -F', ok: true, exitCode: 0 },
      ],
    })
    expect(channel.execs[0].stdin).toBe('rdr net0 0.0.0.0/0 port 50000 -> 10.0.0.7 port 22\n')
    expect(state).toEqual({ phase: 'Idle' })
  })

  test('skips the NAT rule when no port was forwarded', async () => {
    const channel = new FakeChannel()
    const { lifecycle } = createLifecycle(channel)

    const report = await lifecycle.destroy({ phase: 'NetworkPending', zoneName: 'web-2', zoneIp: '10.0.0.8' })

    expect(report.steps.map((step) => step.step)).toEqual(['halt', 'uninstall', 'delete'])
  })

  test('clears a forwarded port recorded without an address', async () => {
    const channel = new FakeChannel()
    const { lifecycle } = createLifecycle(channel)
    const state: RunState = { phase: 'NetworkReady', zonePort: 42022 }

    const report = await lifecycle.destroy(state)

    expect(report.steps).toEqual([])
    expect(state).toEqual({ phase: 'Idle' })
    expect(channel.lines).toEqual([])
  })

  test('does nothing for an empty state', async () => {
    const channel = new FakeChannel()
    const { lifecycle } = createLifecycle(channel)

    const report = await lifecycle.destroy({})

    expect(report.steps).toEqual([])
    expect(channel.lines).toEqual([])
  })
})
