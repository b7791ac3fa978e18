/**
 * Unit tests for ServiceRegistry lifecycle ordering.
 */

import { describe, it, expect } from 'vitest'
import { ServiceRegistry, type BaseService } from '../di.js'

function recordingService(name: string, log: string[], failOnShutdown = false): BaseService {
  return {
    async initialize() {
      log.push(`init:${name}`)
    },
    async shutdown() {
      log.push(`shutdown:${name}`)
      if (failOnShutdown) throw new Error(`${name} failed`)
    },
  }
}

describe('ServiceRegistry', () => {
  it('initializes in registration order and shuts down in reverse', async () => {
    const log: string[] = []
    const registry = new ServiceRegistry()
    registry.register('database', recordingService('database', log))
    registry.register('toolServer', recordingService('toolServer', log))

    await registry.initializeAll()
    await registry.shutdownAll()

    expect(log).toEqual(['init:database', 'init:toolServer', 'shutdown:toolServer', 'shutdown:database'])
  })

  it('rejects duplicate names', () => {
    const registry = new ServiceRegistry()
    registry.register('database', recordingService('database', []))
    expect(() => registry.register('database', recordingService('database', []))).toThrow(
      'Service "database" is already registered',
    )
  })

  it('shuts down every service even when one fails, then reports the failure', async () => {
    const log: string[] = []
    const registry = new ServiceRegistry()
    registry.register('a', recordingService('a', log))
    registry.register('b', recordingService('b', log, true))

    await expect(registry.shutdownAll()).rejects.toThrow('Shutdown errors in 1 service(s)')
    expect(log).toEqual(['shutdown:b', 'shutdown:a'])
  })

  it('lists service names in registration order', () => {
    const registry = new ServiceRegistry()
    registry.register('x', recordingService('x', []))
    registry.register('y', recordingService('y', []))
    expect(registry.serviceNames).toEqual(['x', 'y'])
  })
})
