/**
 * Per-link titles for posts that list several resources.
 *
 * A link takes the text before it on its own line (`Movie A：https://...`),
 * else the nearest title-like line above it since the previous link line,
 * else the title of the link before it. Labels such as 链接： and field
 * lines such as 提取码： never become titles.
 */

import { canonicalizeLinkUrl } from '../utils/url.js'

const URL_PATTERN = /(?:https?:\/\/|magnet:\?|ed2k:\/\/)[^\s"'<>]+/gi
const LINK_LABELS = ['资源地址', '网盘地址', '下载地址', '链接', '地址', '网盘', '下载']
const TITLE_LABEL = /^(?:名称|标题|片名)\s*[:：]\s*/
const FIELD_LINE = /^(?:提取码|提取密码|访问码|密码|口令|描述|简介|大小|标签|类型|说明|频道|来自|pwd|password|code)\s*[:：=]/i
const CREDENTIAL_SNIPPET = /(?:提取码|提取密码|访问码|密码|口令|pwd|password)\s*[:：=]?\s*[A-Za-z0-9]+/gi
const SYMBOLS = /[\p{So}\p{Sk}]/gu
/** Provider names left after stripping a label, e.g. 百度 from 百度链接 */
const MAX_BARE_LABEL_PREFIX = 4

export function cleanTitle(text: string): string {
  return text.replace(SYMBOLS, '').trim().replace(TITLE_LABEL, '').trim()
}

function titleFromSegment(segment: string): string {
  let text = segment.replace(CREDENTIAL_SNIPPET, '').trim().replace(/[\s:：=]+$/, '')
  const label = LINK_LABELS.find((l) => text.endsWith(l))
  if (label) {
    text = text.slice(0, -label.length).trim()
    if (text.length <= MAX_BARE_LABEL_PREFIX && !/\s/.test(text)) return ''
  }
  return cleanTitle(text)
}

/**
 * Title per link found in `content`, keyed by canonical URL. Links without
 * any title-like text around them are absent.
 */
export function extractLinkTitles(content: string): Map<string, string> {
  const titles = new Map<string, string>()
  let pending: string[] = []
  let previous: string | undefined

  for (const line of content.split(/\r?\n/)) {
    const matches = [...line.matchAll(URL_PATTERN)]
    if (matches.length === 0) {
      const candidate = line.trim()
      if (candidate && !FIELD_LINE.test(candidate)) pending.push(candidate)
      continue
    }

    let cursor = 0
    matches.forEach((match, index) => {
      const raw = match[0]
      const start = match.index ?? cursor
      let title = titleFromSegment(line.slice(cursor, start))
      if (!title && index === 0) title = pending.map(cleanTitle).filter(Boolean).pop() ?? ''
      if (!title) title = previous ?? ''
      cursor = start + raw.length

      const key = canonicalizeLinkUrl(raw) || raw
      if (!title || titles.has(key)) return
      titles.set(key, title)
      previous = title
    })
    pending = []
  }
  return titles
}

/**
 * Exact canonical match, else a scanned URL that extends `url` past a
 * path boundary (the scanned one may still carry a credential param).
 */
export function findLinkTitle(titles: ReadonlyMap<string, string>, url: string): string | undefined {
  const exact = titles.get(url)
  if (exact !== undefined) return exact
  for (const [scanned, title] of titles) {
    if (scanned.startsWith(url) && !/[A-Za-z0-9_-]/.test(scanned.charAt(url.length))) return title
  }
  return undefined
}
