import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { createSessionRunner, type ParameterSink, type SessionRunner } from './runner.js'
import { AdaptationOrchestrator } from './orchestrator.js'
import type { AdaptationEvent } from './adaptation-events.js'
import { parseConfig } from './config.js'
import type { AdaptationParameters } from './types.js'
import { FeedbackChannel } from '../extension/feedback/index.js'
import { createProfileRegistry } from '../extension/profiles/index.js'
import { AudioParameterShaper } from '../extension/audio/index.js'

const config = parseConfig()

// ==================== Helpers ====================

function recordingSink(name = 'display') {
  const received: Readonly<AdaptationParameters>[] = []
  const sink: ParameterSink = {
    name,
    apply: (params) => { received.push(params) },
  }
  return { sink, received }
}

function setup(sinks: ParameterSink[], orchestrator?: AdaptationOrchestrator) {
  const orch = orchestrator ?? new AdaptationOrchestrator({ registry: createProfileRegistry(config.profiles), config })
  const feedback = new FeedbackChannel()
  const runner = createSessionRunner({
    orchestrator: orch,
    feedback,
    identity: () => ({ breedName: 'default', age: 'adult' }),
    sinks,
  })
  return { orch, feedback, runner }
}

let runner: SessionRunner | undefined

beforeEach(() => {
  vi.useFakeTimers()
})

afterEach(() => {
  runner?.stop()
  runner = undefined
  vi.useRealTimers()
})

// ==================== Timer ====================

describe('createSessionRunner', () => {
  it('evaluates on every interval and delivers to sinks', async () => {
    const { sink, received } = recordingSink()
    const ctx = setup([sink])
    runner = ctx.runner

    runner.start()
    expect(runner.isRunning).toBe(true)

    await vi.advanceTimersByTimeAsync(2000)
    expect(received).toHaveLength(1)
    expect(received[0].elapsedSeconds).toBe(0)

    await vi.advanceTimersByTimeAsync(4000)
    expect(received).toHaveLength(3)
    expect(received[2].elapsedSeconds).toBe(4)
  })

  it('stops ticking after stop()', async () => {
    const { sink, received } = recordingSink()
    const ctx = setup([sink])
    runner = ctx.runner

    runner.start()
    await vi.advanceTimersByTimeAsync(2000)
    runner.stop()
    await vi.advanceTimersByTimeAsync(10_000)

    expect(received).toHaveLength(1)
    expect(runner.isRunning).toBe(false)
  })

  it('emits session start and stop events', () => {
    const ctx = setup([])
    runner = ctx.runner
    const sessions: AdaptationEvent<'session'>[] = []
    ctx.orch.bus.onStream('session', (evt) => sessions.push(evt))

    runner.start()
    runner.start()
    runner.stop()

    expect(sessions.map((e) => e.data.action)).toEqual(['started', 'stopped'])
  })
})

// ==================== Feedback ====================

describe('tickNow', () => {
  it('assumes a resting subject until feedback arrives', async () => {
    const ctx = setup([])
    runner = ctx.runner

    const result = await runner.tickNow()

    expect(result.status).toBe('delivered')
    expect(result.params?.stressLevel).toBe('low')
  })

  it('uses the newest sample and keeps it until a new one arrives', async () => {
    const ctx = setup([])
    runner = ctx.runner

    ctx.feedback.push({ stressLevel: 'moderate', movementRate: 0.3 })
    ctx.feedback.push({ stressLevel: 'high', movementRate: 0.6 })
    const first = await runner.tickNow()
    const second = await runner.tickNow()

    expect(first.params?.stressLevel).toBe('high')
    expect(second.params?.stressLevel).toBe('high')
  })

  it('skips a tick while the previous one is still delivering', async () => {
    let release = () => {}
    const slow: ParameterSink = {
      name: 'slow',
      apply: () => new Promise<void>((resolve) => { release = () => resolve() }),
    }
    const ctx = setup([slow])
    runner = ctx.runner

    const pending = runner.tickNow()
    const skipped = await runner.tickNow()
    release()
    const done = await pending

    expect(skipped).toEqual({ status: 'skipped', reason: 'busy' })
    expect(done.status).toBe('delivered')
    expect(ctx.orch.history).toHaveLength(1)
  })

  it('reports failing sinks without starving the others', async () => {
    const { sink, received } = recordingSink('audio')
    const broken: ParameterSink = {
      name: 'display',
      apply: () => { throw new Error('surface lost') },
    }
    const ctx = setup([broken, sink])
    runner = ctx.runner
    const failures: AdaptationEvent<'sink'>[] = []
    ctx.orch.bus.onStream('sink', (evt) => failures.push(evt))

    const result = await runner.tickNow()

    expect(result.status).toBe('delivered')
    expect(result.failedSinks).toEqual(['display'])
    expect(received).toHaveLength(1)
    expect(failures.map((e) => e.data)).toEqual([{ sink: 'display', error: 'surface lost' }])
  })

  it('fails the tick when strict evaluation rejects the output', async () => {
    class RacingShaper extends AudioParameterShaper {
      override shape(...args: Parameters<AudioParameterShaper['shape']>) {
        return { ...super.shape(...args), volumeCeilingDb: 90 }
      }
    }
    const orch = new AdaptationOrchestrator({
      registry: createProfileRegistry(config.profiles),
      config,
      strict: true,
      shapers: { audio: new RacingShaper(config.safety) },
    })
    const { sink, received } = recordingSink()
    const ctx = setup([sink], orch)
    runner = ctx.runner

    const result = await runner.tickNow()

    expect(result).toEqual({ status: 'failed', reason: 'Parameter volumeCeilingDb=90 outside [20, 65]' })
    expect(received).toHaveLength(0)
  })
})
