import { describe, it, expect } from 'vitest'
import { parseCliOptions } from './cli'

describe('parseCliOptions', () => {
  it('should default the config file to conf.json', () => {
    expect(parseCliOptions([])).toEqual({ config: 'conf.json' })
  })

  it('should read every short flag', () => {
    expect(
      parseCliOptions(['-c', 'agent.json', '-j', 'agent@example.com', '-p', 'test-secret', '-s', 'bus:5223', '-a', ':9090', '-d'])
    ).toEqual({
      config: 'agent.json',
      jid: 'agent@example.com',
      password: 'test-secret',
      server: 'bus:5223',
      api: ':9090',
      debug: true,
    })
  })

  it('should read long flags', () => {
    expect(parseCliOptions(['--jid', 'agent@example.com', '--api', 'localhost'])).toEqual({
      config: 'conf.json',
      jid: 'agent@example.com',
      api: 'localhost',
    })
  })
})
