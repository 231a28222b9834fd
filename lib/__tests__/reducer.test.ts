import { describe, it, expect } from 'vitest'
import { createCliStore, createInitialState } from '../store/index.js'
import { reduce } from '../store/reducer.js'
import type { CliState, Intent } from '../store/types.js'
import type { Frame } from '../spiral/types.js'

// ---------------------------------------------------------------------------
// Factory: creates a clean initial state for each test
// ---------------------------------------------------------------------------

function freshState(anomalyPct: number | null = null): CliState {
  return createInitialState({ anomalyPct, fallbackPct: 70 })
}

function run(state: CliState, ...intents: Intent[]): CliState {
  return intents.reduce(reduce, state)
}

const LAST_FRAME: Frame = {
  index: 149,
  timeSeconds: 149 / 30,
  revealed: 3,
  visibleCount: 3,
  scale: 2,
  draws: [],
}

const SUMMARY = { destination: '/tmp/spiral.svg', frameCount: 150, numChars: 3 }

// ---------------------------------------------------------------------------
// Initial state
// ---------------------------------------------------------------------------

describe('createInitialState', () => {
  it('should prompt when no percentage was given', () => {
    const state = freshState()
    expect(state.phase).toBe('prompt')
    expect(state.anomalyPct).toBeNull()
  })

  it('should be ready when the percentage is known', () => {
    const state = freshState(35)
    expect(state.phase).toBe('ready')
    expect(state.anomalyPct).toBe(35)
  })
})

// ---------------------------------------------------------------------------
// Anomaly prompt
// ---------------------------------------------------------------------------

describe('anomaly prompt', () => {
  it('should record typed input', () => {
    const state = reduce(freshState(), { type: 'SET_ANOMALY_INPUT', value: '42' })
    expect(state.anomalyInput).toBe('42')
  })

  it('should cap the input length', () => {
    const state = reduce(freshState(), { type: 'SET_ANOMALY_INPUT', value: '1'.repeat(40) })
    expect(state.anomalyInput).toHaveLength(16)
  })

  it('should parse the input on submit', () => {
    const state = run(
      freshState(),
      { type: 'SET_ANOMALY_INPUT', value: ' 42.5 ' },
      { type: 'SUBMIT_ANOMALY' },
    )
    expect(state.phase).toBe('ready')
    expect(state.anomalyPct).toBe(42.5)
  })

  it('should use the fallback for unusable input', () => {
    const state = run(
      freshState(),
      { type: 'SET_ANOMALY_INPUT', value: 'lots' },
      { type: 'SUBMIT_ANOMALY' },
    )
    expect(state.anomalyPct).toBe(70)
  })

  it('should clamp out-of-range input', () => {
    const state = run(
      freshState(),
      { type: 'SET_ANOMALY_INPUT', value: '250' },
      { type: 'SUBMIT_ANOMALY' },
    )
    expect(state.anomalyPct).toBe(100)
  })

  it('should ignore input once the percentage is known', () => {
    const state = run(
      freshState(35),
      { type: 'SET_ANOMALY_INPUT', value: '10' },
      { type: 'SUBMIT_ANOMALY' },
    )
    expect(state.anomalyInput).toBe('')
    expect(state.anomalyPct).toBe(35)
  })
})

// ---------------------------------------------------------------------------
// Render lifecycle
// ---------------------------------------------------------------------------

describe('render lifecycle', () => {
  it('should not start before the percentage is known', () => {
    const state = reduce(freshState(), { type: 'RENDER_STARTED', totalFrames: 150, numChars: 3 })
    expect(state.phase).toBe('prompt')
  })

  it('should track progress while rendering', () => {
    const state = run(
      freshState(50),
      { type: 'RENDER_STARTED', totalFrames: 150, numChars: 3 },
      { type: 'FRAME_COMPOSED', frameIndex: 0, visibleCount: 1 },
      { type: 'FRAME_COMPOSED', frameIndex: 4, visibleCount: 2 },
    )
    expect(state.phase).toBe('rendering')
    expect(state.progress).toEqual({
      framesComposed: 5,
      totalFrames: 150,
      visibleCount: 2,
      numChars: 3,
    })
  })

  it('should never move progress backwards', () => {
    const state = run(
      freshState(50),
      { type: 'RENDER_STARTED', totalFrames: 150, numChars: 3 },
      { type: 'FRAME_COMPOSED', frameIndex: 9, visibleCount: 2 },
      { type: 'FRAME_COMPOSED', frameIndex: 3, visibleCount: 2 },
    )
    expect(state.progress.framesComposed).toBe(10)
  })

  it('should ignore frames outside a render', () => {
    const state = reduce(freshState(50), { type: 'FRAME_COMPOSED', frameIndex: 3, visibleCount: 2 })
    expect(state.progress.framesComposed).toBe(0)
  })

  it('should keep the summary and last frame when finished', () => {
    const state = run(
      freshState(50),
      { type: 'RENDER_STARTED', totalFrames: 150, numChars: 3 },
      { type: 'RENDER_FINISHED', summary: SUMMARY, lastFrame: LAST_FRAME },
    )
    expect(state.phase).toBe('done')
    expect(state.summary).toEqual(SUMMARY)
    expect(state.lastFrame).toEqual(LAST_FRAME)
  })

  it('should record failures', () => {
    const state = run(
      freshState(50),
      { type: 'RENDER_STARTED', totalFrames: 150, numChars: 3 },
      { type: 'RENDER_FAILED', message: 'disk full' },
    )
    expect(state.phase).toBe('error')
    expect(state.error).toBe('disk full')
  })

  it('should stay in a terminal phase', () => {
    const state = run(
      freshState(50),
      { type: 'RENDER_EMPTY' },
      { type: 'RENDER_FAILED', message: 'late' },
      { type: 'RENDER_FINISHED', summary: SUMMARY, lastFrame: null },
    )
    expect(state.phase).toBe('empty')
    expect(state.error).toBeNull()
    expect(state.summary).toBeNull()
  })

  it('should not mutate the previous state', () => {
    const before = freshState(50)
    const after = reduce(before, { type: 'RENDER_STARTED', totalFrames: 150, numChars: 3 })
    expect(before.phase).toBe('ready')
    expect(before.progress.totalFrames).toBe(0)
    expect(after).not.toBe(before)
  })
})

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

describe('createCliStore', () => {
  it('should apply dispatched intents', () => {
    const store = createCliStore({ anomalyPct: null, fallbackPct: 70 })
    store.getState().dispatch({ type: 'SET_ANOMALY_INPUT', value: '12' })
    store.getState().dispatch({ type: 'SUBMIT_ANOMALY' })
    expect(store.getState().phase).toBe('ready')
    expect(store.getState().anomalyPct).toBe(12)
  })

  it('should keep separate stores independent', () => {
    const a = createCliStore({ anomalyPct: 10, fallbackPct: 70 })
    const b = createCliStore({ anomalyPct: null, fallbackPct: 70 })
    a.getState().dispatch({ type: 'RENDER_EMPTY' })
    expect(a.getState().phase).toBe('empty')
    expect(b.getState().phase).toBe('prompt')
  })
})
