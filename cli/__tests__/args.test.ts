import { describe, it, expect } from 'vitest'
import { parseCliArgs } from '../lib/args.js'

describe('parseCliArgs', () => {
  it('should default everything but the text file', () => {
    expect(parseCliArgs(['story.txt'])).toEqual({
      kind: 'run',
      options: {
        textPath: 'story.txt',
        anomalyRaw: null,
        outputPath: 'spiral_growing.svg',
        configPath: undefined,
      },
    })
  })

  it('should read short options', () => {
    expect(parseCliArgs(['-a', '35', '-o', 'out.json', '-c', 'spiral.yml', 'story.txt'])).toEqual({
      kind: 'run',
      options: {
        textPath: 'story.txt',
        anomalyRaw: '35',
        outputPath: 'out.json',
        configPath: 'spiral.yml',
      },
    })
  })

  it('should keep the anomaly value raw', () => {
    const parsed = parseCliArgs(['--anomaly', 'lots', 'story.txt'])
    expect(parsed.kind === 'run' && parsed.options.anomalyRaw).toBe('lots')
  })

  it('should ask for help', () => {
    expect(parseCliArgs(['-h'])).toEqual({ kind: 'help' })
    expect(parseCliArgs(['story.txt', '--help'])).toEqual({ kind: 'help' })
  })

  it('should require a text file', () => {
    expect(parseCliArgs([])).toEqual({ kind: 'error', message: 'Missing text file argument' })
  })

  it('should reject extra positionals', () => {
    expect(parseCliArgs(['a.txt', 'b.txt', 'c.txt'])).toEqual({
      kind: 'error',
      message: 'Unexpected arguments: b.txt c.txt',
    })
  })

  it('should reject unknown options', () => {
    expect(parseCliArgs(['--bogus', 'story.txt']).kind).toBe('error')
  })
})
