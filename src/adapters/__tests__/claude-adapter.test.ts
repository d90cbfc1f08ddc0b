import { describe, it, expect } from 'vitest'
import { ClaudeCodeAdapter, createClaudeAdapter } from '../claude-adapter.js'

describe('ClaudeCodeAdapter', () => {
  it('builds a headless stream-json invocation with the prompt last', () => {
    const cmd = createClaudeAdapter().buildCommand('Fix issue 42', { cwd: '/repo' })

    expect(cmd).toEqual({
      binary: 'claude',
      args: ['--dangerously-skip-permissions', '--verbose', '--output-format', 'stream-json', '-p', 'Fix issue 42'],
      unsetEnvKeys: ['CLAUDECODE', 'CLAUDE_CODE_ENTRYPOINT'],
      cwd: '/repo',
    })
  })

  it('passes the model and extra flags before the prompt', () => {
    const adapter = new ClaudeCodeAdapter({ binary: '/opt/bin/claude' })

    const cmd = adapter.buildCommand('p', {
      cwd: '/repo',
      model: 'test-model',
      additionalFlags: ['--max-turns', '30'],
    })

    expect(cmd.binary).toBe('/opt/bin/claude')
    expect(cmd.args.slice(4)).toEqual(['--model', 'test-model', '--max-turns', '30', '-p', 'p'])
  })
})
