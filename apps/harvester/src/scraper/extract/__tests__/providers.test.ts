import { describe, it, expect, afterEach } from 'vitest'
import { mkdtempSync, rmSync, writeFileSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { ZodError } from 'zod'
import { createProviderTable, loadProviderTable, matchesCredentialRule } from '../providers.js'
import { extractLinkRecords } from '../document.js'
import { PROVIDER_TYPES } from '../../types.js'
import { TEST_PROVIDER_ENTRIES } from '../../__tests__/fixtures/providers.js'

describe('loadProviderTable', () => {
  let tempDir: string | undefined

  afterEach(() => {
    if (tempDir) {
      rmSync(tempDir, { recursive: true, force: true })
      tempDir = undefined
    }
  })

  it('loads the bundled table with every provider type', () => {
    expect(loadProviderTable().types()).toEqual([...PROVIDER_TYPES])
  })

  it('extracts a baidu share link with its code from the bundled table', () => {
    const records = extractLinkRecords(
      '链接：https://pan.baidu.com/s/1AbC-dEf_gh 提取码：x7y8',
      loadProviderTable()
    )

    expect(records).toEqual([
      {
        url: 'https://pan.baidu.com/s/1AbC-dEf_gh',
        providerType: 'baidu',
        origin: 'associated',
        password: 'x7y8',
      },
    ])
  })

  it('reads an inline quark passcode from the bundled table', () => {
    const records = extractLinkRecords('https://pan.quark.cn/s/abcd1234?pwd=Q1w2', loadProviderTable())

    expect(records).toEqual([
      {
        url: 'https://pan.quark.cn/s/abcd1234',
        providerType: 'quark',
        origin: 'inline',
        password: 'Q1w2',
      },
    ])
  })

  it('rejects a file that is not an array', () => {
    tempDir = mkdtempSync(join(tmpdir(), 'providers-'))
    const path = join(tempDir, 'providers.json')
    writeFileSync(path, '{"type":"baidu"}')

    expect(() => loadProviderTable(path)).toThrow(`Provider table at ${path} must be a JSON array`)
  })
})

describe('createProviderTable', () => {
  it('compiles patterns as global regexes', () => {
    const table = createProviderTable(TEST_PROVIDER_ENTRIES)

    expect(table.types()).toEqual(['baidu', 'quark', 'magnet'])
    expect(table.get('baidu')?.pattern.flags).toBe('g')
    expect(table.get('ed2k')).toBeUndefined()
  })

  it('rejects duplicate provider types', () => {
    const [first] = TEST_PROVIDER_ENTRIES

    expect(() => createProviderTable([first, first])).toThrow(
      "Duplicate provider type 'baidu' in provider table"
    )
  })

  it('rejects unknown provider types', () => {
    expect(() =>
      createProviderTable([{ ...TEST_PROVIDER_ENTRIES[0], type: 'dropbox' }])
    ).toThrow(ZodError)
  })
})

describe('matchesCredentialRule', () => {
  const rule = { charClass: 'A-Za-z0-9', minLength: 4, maxLength: 4 }

  it('checks length and characters of the whole value', () => {
    expect(matchesCredentialRule('ab12', rule)).toBe(true)
    expect(matchesCredentialRule('ab1', rule)).toBe(false)
    expect(matchesCredentialRule('ab-2', rule)).toBe(false)
  })
})
