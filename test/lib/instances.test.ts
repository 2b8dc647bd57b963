import { expect } from 'chai'
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import { ValidationError } from '../../src/lib/errors.js'
import {
  DEFAULT_HOST,
  DEFAULT_PORT,
  getInstancesPath,
  InstanceRegistry,
  resolveConnection,
} from '../../src/lib/instances.js'
import { logger, VERBOSITY } from '../../src/lib/logger.js'

const SAMPLE_YAML = `default: LOCAL
instances:
  LOCAL:
    host: localhost
    port: 57772
    username: dev
    password: test-secret
  STAGING:
    host: staging.internal
    port: 57773
`

describe('lib/instances', () => {
  let tempDir: string

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'cdev-instances-test-'))
    logger.setLevel(VERBOSITY.SILENT)
  })

  afterEach(() => {
    rmSync(tempDir, { force: true, recursive: true })
    logger.setLevel(VERBOSITY.NORMAL)
  })

  describe('InstanceRegistry.load', () => {
    it('returns an empty registry when the file is missing', () => {
      const registry = InstanceRegistry.load(join(tempDir, 'missing.yaml'))

      expect(registry.listNames()).to.deep.equal([])
      expect(registry.getDefault()).to.be.undefined
    })

    it('reads instances and the default', () => {
      const path = join(tempDir, 'instances.yaml')
      writeFileSync(path, SAMPLE_YAML)

      const registry = InstanceRegistry.load(path)

      expect(registry.listNames()).to.deep.equal(['LOCAL', 'STAGING'])
      expect(registry.getDefault()).to.deep.equal({
        host: 'localhost',
        name: 'LOCAL',
        password: 'test-secret',
        port: 57_772,
        username: 'dev',
      })
    })

    it('looks instances up ignoring case', () => {
      const path = join(tempDir, 'instances.yaml')
      writeFileSync(path, SAMPLE_YAML)

      expect(InstanceRegistry.load(path).get('staging')?.host).to.equal('staging.internal')
    })

    it('ignores a file with the wrong shape', () => {
      const path = join(tempDir, 'instances.yaml')
      writeFileSync(path, 'instances:\n  LOCAL:\n    host: localhost\n')

      expect(InstanceRegistry.load(path).listNames()).to.deep.equal([])
    })

    it('ignores a file that is not YAML', () => {
      const path = join(tempDir, 'instances.yaml')
      writeFileSync(path, 'instances: [unclosed')

      expect(InstanceRegistry.load(path).listNames()).to.deep.equal([])
    })
  })

  describe('InstanceRegistry editing', () => {
    it('saves and reloads instances', () => {
      const path = join(tempDir, 'nested', 'instances.yaml')
      const registry = InstanceRegistry.load(path)
      registry.add({ host: 'db1', name: 'PROD', port: 57_772 })
      registry.setDefault('prod')
      registry.save()

      expect(readFileSync(path, 'utf8')).to.equal('instances:\n  PROD:\n    host: db1\n    port: 57772\ndefault: PROD\n')

      const reloaded = InstanceRegistry.load(path)
      expect(reloaded.getDefault()).to.deep.equal({ host: 'db1', name: 'PROD', port: 57_772 })
    })

    it('replaces an instance added under another case', () => {
      const registry = InstanceRegistry.load(join(tempDir, 'instances.yaml'))
      registry.add({ host: 'a', name: 'LOCAL', port: 1 })
      registry.add({ host: 'b', name: 'local', port: 2 })

      expect(registry.listNames()).to.deep.equal(['local'])
    })

    it('clears the default when it is removed', () => {
      const registry = InstanceRegistry.load(join(tempDir, 'instances.yaml'))
      registry.add({ host: 'a', name: 'LOCAL', port: 1 })
      registry.setDefault('LOCAL')

      expect(registry.remove('local')).to.equal(true)
      expect(registry.getDefault()).to.be.undefined
      expect(registry.remove('local')).to.equal(false)
    })

    it('refuses an unknown default', () => {
      const registry = InstanceRegistry.load(join(tempDir, 'instances.yaml'))

      expect(() => registry.setDefault('NOPE')).to.throw(ValidationError, 'Instance "NOPE" not found')
    })
  })

  describe('getInstancesPath', () => {
    const originalHome = process.env.CDEV_HOME

    afterEach(() => {
      if (originalHome === undefined) {
        delete process.env.CDEV_HOME
      } else {
        process.env.CDEV_HOME = originalHome
      }
    })

    it('honors CDEV_HOME', () => {
      process.env.CDEV_HOME = tempDir

      expect(getInstancesPath()).to.equal(join(tempDir, 'instances.yaml'))
    })
  })

  describe('resolveConnection', () => {
    let registry: InstanceRegistry

    beforeEach(() => {
      const path = join(tempDir, 'instances.yaml')
      writeFileSync(path, SAMPLE_YAML)
      registry = InstanceRegistry.load(path)
    })

    it('uses explicit host and port over the default instance', () => {
      expect(resolveConnection({ host: 'other', port: 8080 }, registry)).to.deep.equal({
        host: 'other',
        password: 'SYS',
        port: 8080,
        username: '_SYSTEM',
      })
    })

    it('uses the named instance', () => {
      expect(resolveConnection({ instance: 'staging' }, registry)).to.deep.equal({
        host: 'staging.internal',
        password: 'SYS',
        port: 57_773,
        username: '_SYSTEM',
      })
    })

    it('falls back to the default instance', () => {
      expect(resolveConnection({}, registry)).to.deep.equal({
        host: 'localhost',
        password: 'test-secret',
        port: 57_772,
        username: 'dev',
      })
    })

    it('lets credentials override the instance entry', () => {
      const connection = resolveConnection({ instance: 'LOCAL', password: 'other-secret', username: 'admin' }, registry)

      expect(connection.username).to.equal('admin')
      expect(connection.password).to.equal('other-secret')
    })

    it('uses built-in defaults with an empty registry', () => {
      const empty = InstanceRegistry.load(join(tempDir, 'missing.yaml'))

      expect(resolveConnection({}, empty)).to.deep.equal({
        host: DEFAULT_HOST,
        password: 'SYS',
        port: DEFAULT_PORT,
        username: '_SYSTEM',
      })
    })

    it('rejects an unknown instance', () => {
      expect(() => resolveConnection({ instance: 'NOPE' }, registry))
        .to.throw(ValidationError, 'Instance "NOPE" not found. Known instances: LOCAL, STAGING')
    })
  })
})
