import { describe, it, expect } from 'vitest'
import { cleanTitle, extractLinkTitles, findLinkTitle } from '../link-titles.js'

describe('cleanTitle', () => {
  it('drops symbols and a leading name label', () => {
    expect(cleanTitle(' 🎬 名称：Example Film ')).toBe('Example Film')
    expect(cleanTitle('标题: Plain')).toBe('Plain')
  })
})

describe('extractLinkTitles', () => {
  it('takes the nearest title line above each link line', () => {
    const content = [
      '合集 2024',
      'Movie A',
      '链接：https://pan.example.com/s/aaa',
      '提取码：ab12',
      'Movie B',
      '描述：sequel',
      '链接：https://pan.example.com/s/bbb?pwd=cd34',
    ].join('\n')

    expect([...extractLinkTitles(content)]).toEqual([
      ['https://pan.example.com/s/aaa', 'Movie A'],
      ['https://pan.example.com/s/bbb?pwd=cd34', 'Movie B'],
    ])
  })

  it('reads titles written before links on the same line', () => {
    const content =
      'Movie A：https://drive.example.org/s/a1 Movie B 链接：https://drive.example.org/s/b2 https://drive.example.org/s/b3'

    expect([...extractLinkTitles(content)]).toEqual([
      ['https://drive.example.org/s/a1', 'Movie A'],
      ['https://drive.example.org/s/b2', 'Movie B'],
      ['https://drive.example.org/s/b3', 'Movie B'],
    ])
  })

  it('skips access codes between links on one line', () => {
    const content = 'Movie A https://pan.example.com/s/a1 提取码: ab12 Movie B https://pan.example.com/s/b2'

    expect(extractLinkTitles(content).get('https://pan.example.com/s/b2')).toBe('Movie B')
  })

  it('ignores provider labels in front of a link', () => {
    const content = 'Example Show\n百度网盘：https://pan.example.com/s/ccc'

    expect(extractLinkTitles(content).get('https://pan.example.com/s/ccc')).toBe('Example Show')
  })

  it('leaves out links with no title around them', () => {
    expect(extractLinkTitles('https://pan.example.com/s/ddd').size).toBe(0)
  })
})

describe('findLinkTitle', () => {
  const titles = new Map([
    ['https://pan.example.com/s/abc?pwd=ab12', 'With code'],
    ['magnet:?xt=urn:btih:ABC', 'Torrent'],
  ])

  it('matches exactly or on a scanned url that extends past a boundary', () => {
    expect(findLinkTitle(titles, 'magnet:?xt=urn:btih:ABC')).toBe('Torrent')
    expect(findLinkTitle(titles, 'https://pan.example.com/s/abc')).toBe('With code')
  })

  it('does not match a shorter share id', () => {
    expect(findLinkTitle(titles, 'https://pan.example.com/s/ab')).toBeUndefined()
  })
})
