/**
 * Unit tests for TypedEventBus.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest'
import { createEventBus } from '../event-bus.js'
import type { TypedEventBus } from '../event-bus.js'
import type { ProcessEvents } from '../event-bus.types.js'

describe('TypedEventBusImpl', () => {
  let bus: TypedEventBus

  beforeEach(() => {
    bus = createEventBus()
  })

  it('invokes handler when matching event is emitted', () => {
    const handler = vi.fn()
    bus.on('process:step-started', handler)

    const payload: ProcessEvents['process:step-started'] = {
      processId: 'p1',
      stepIndex: 0,
      totalSteps: 2,
      taskName: 'implement',
      taskId: 't1',
    }
    bus.emit('process:step-started', payload)

    expect(handler).toHaveBeenCalledTimes(1)
    expect(handler).toHaveBeenCalledWith(payload)
  })

  it('does not invoke handlers of other events', () => {
    const handler = vi.fn()
    bus.on('process:completed', handler)

    bus.emit('process:aborted', { processId: 'p1', stepIndex: 0, reason: 'stop' })

    expect(handler).not.toHaveBeenCalled()
  })

  it('off() removes a handler', () => {
    const handler = vi.fn()
    bus.on('process:aborted', handler)
    bus.off('process:aborted', handler)

    bus.emit('process:aborted', { processId: 'p1', stepIndex: 0, reason: 'stop' })

    expect(handler).not.toHaveBeenCalled()
  })

  it('dispatches synchronously to every handler in registration order', () => {
    const order: string[] = []
    bus.on('orchestrator:review', () => order.push('first'))
    bus.on('orchestrator:review', () => order.push('second'))

    bus.emit('orchestrator:review', { processId: 'p1', stepIndex: 0, taskId: 't1', hasReview: true })
    order.push('after-emit')

    expect(order).toEqual(['first', 'second', 'after-emit'])
  })
})
