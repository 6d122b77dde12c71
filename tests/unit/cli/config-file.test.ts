import { vi, describe, it, expect, beforeEach } from 'vitest'
import { vol } from 'memfs'

vi.mock('node:fs', async () => {
  const m = await vi.importActual<typeof import('memfs')>('memfs')
  return { default: m.fs, ...m.fs }
})
vi.mock('node:fs/promises', async () => {
  const m = await vi.importActual<typeof import('memfs')>('memfs')
  return { default: m.fs.promises, ...m.fs.promises }
})

const { loadConfigFile } = await import('../../../src/cli/config-file.js')
const { ConfigFileError } = await import('../../../src/errors.js')

describe('loadConfigFile', () => {
  beforeEach(() => {
    vol.reset()
  })

  it('returns the YAML mapping as-is', async () => {
    vol.fromJSON({ '/cfg/loglyzer.yaml': 'format: json\ntop: 3\nerrorsOnly: true\nsearch: db\n' })
    await expect(loadConfigFile('/cfg/loglyzer.yaml')).resolves.toEqual({
      format: 'json',
      top: 3,
      errorsOnly: true,
      search: 'db',
    })
  })

  it('empty file → empty object', async () => {
    vol.fromJSON({ '/cfg/empty.yaml': '' })
    await expect(loadConfigFile('/cfg/empty.yaml')).resolves.toEqual({})
  })

  it('comment-only file → empty object', async () => {
    vol.fromJSON({ '/cfg/comments.yaml': '# nothing configured yet\n' })
    await expect(loadConfigFile('/cfg/comments.yaml')).resolves.toEqual({})
  })

  it('sequence document → ConfigFileError', async () => {
    vol.fromJSON({ '/cfg/list.yaml': '- json\n- csv\n' })
    await expect(loadConfigFile('/cfg/list.yaml')).rejects.toThrow(
      'Config file /cfg/list.yaml is invalid: expected a mapping of option names to values',
    )
  })

  it('scalar document → ConfigFileError', async () => {
    vol.fromJSON({ '/cfg/scalar.yaml': 'just text\n' })
    await expect(loadConfigFile('/cfg/scalar.yaml')).rejects.toBeInstanceOf(ConfigFileError)
  })

  it('invalid YAML → ConfigFileError mentioning the parse error', async () => {
    vol.fromJSON({ '/cfg/broken.yaml': 'search: "unterminated\n' })
    await expect(loadConfigFile('/cfg/broken.yaml')).rejects.toThrow('YAML parse error')
  })

  it('missing file → ConfigFileError with "no such file"', async () => {
    vol.fromJSON({ '/cfg/placeholder': '' })
    await expect(loadConfigFile('/cfg/none.yaml')).rejects.toThrow(
      'Config file /cfg/none.yaml is invalid: no such file',
    )
  })
})
