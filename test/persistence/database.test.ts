/**
 * Tests for DatabaseWrapper and DatabaseServiceImpl.
 *
 * Validates:
 *  - open/close lifecycle
 *  - PRAGMA application (busy_timeout, synchronous, foreign_keys)
 *  - initialize() applies the migrations
 *  - parent directories of a file database are created
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { existsSync, mkdtempSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import {
  DatabaseWrapper,
  DatabaseServiceImpl,
  createDatabaseService,
  IN_MEMORY_DATABASE,
} from '../../src/persistence/database.js'
import { getSchemaVersion } from '../../src/persistence/migrations/index.js'

// ---------------------------------------------------------------------------
// DatabaseWrapper
// ---------------------------------------------------------------------------

describe('DatabaseWrapper', () => {
  let wrapper: DatabaseWrapper

  beforeEach(() => {
    wrapper = new DatabaseWrapper(IN_MEMORY_DATABASE)
  })

  afterEach(() => {
    if (wrapper.isOpen) wrapper.close()
  })

  it('starts closed', () => {
    expect(wrapper.isOpen).toBe(false)
  })

  it('throws when the db is read before open', () => {
    expect(() => wrapper.db).toThrow('database is not open')
  })

  it('is idempotent on repeated open calls', () => {
    wrapper.open()
    const first = wrapper.db
    wrapper.open()
    expect(wrapper.db).toBe(first)
  })

  it('is idempotent on repeated close calls', () => {
    wrapper.open()
    wrapper.close()
    expect(() => wrapper.close()).not.toThrow()
    expect(wrapper.isOpen).toBe(false)
  })

  describe('PRAGMA verification', () => {
    it('sets busy_timeout to 5000', () => {
      wrapper.open()
      expect(wrapper.db.pragma('busy_timeout', { simple: true })).toBe(5000)
    })

    it('sets synchronous to NORMAL', () => {
      wrapper.open()
      expect(wrapper.db.pragma('synchronous', { simple: true })).toBe(1)
    })

    it('enables foreign keys', () => {
      wrapper.open()
      expect(wrapper.db.pragma('foreign_keys', { simple: true })).toBe(1)
    })
  })

  describe('file databases', () => {
    let dir: string

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'stepwarden-db-'))
    })

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true })
    })

    it('creates missing parent directories and switches to WAL', () => {
      const path = join(dir, 'nested', 'state', 'history.db')
      const fileWrapper = new DatabaseWrapper(path)
      fileWrapper.open()
      try {
        expect(existsSync(path)).toBe(true)
        expect(fileWrapper.db.pragma('journal_mode', { simple: true })).toBe('wal')
      } finally {
        fileWrapper.close()
      }
    })
  })
})

// ---------------------------------------------------------------------------
// DatabaseServiceImpl
// ---------------------------------------------------------------------------

describe('DatabaseServiceImpl', () => {
  let service: DatabaseServiceImpl

  beforeEach(() => {
    service = new DatabaseServiceImpl(IN_MEMORY_DATABASE)
  })

  afterEach(async () => {
    if (service.isOpen) await service.shutdown()
  })

  it('opens and migrates on initialize()', async () => {
    await service.initialize()
    expect(service.isOpen).toBe(true)
    expect(getSchemaVersion(service.db)).toBe(7)
  })

  it('closes on shutdown()', async () => {
    await service.initialize()
    await service.shutdown()
    expect(service.isOpen).toBe(false)
  })
})

describe('createDatabaseService', () => {
  it('returns a closed service', () => {
    expect(createDatabaseService(IN_MEMORY_DATABASE).isOpen).toBe(false)
  })
})
