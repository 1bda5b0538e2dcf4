/**
 * Telegram Channel Adapter
 *
 * Searches public channels through their web preview (t.me/s/<channel>?q=).
 * Each message with a date and a post id becomes one entry; the link
 * extraction happens later, on the entry text.
 */

import type {
  SearchTarget,
  SourceAdapter,
  SourceAdapterContext,
  SourceEntry,
  TargetScope,
} from '../../types.js'
import { firstAttr, loadHtml, textWithLineBreaks } from '../../utils/html.js'
import { SEARCH_BASE_URL, SELECTORS, TITLE_PREFIXES } from './selectors.js'

export const TELEGRAM_SOURCE_ID = 'telegram'

export function buildChannelSearchUrl(channel: string, keyword: string): string {
  const query = new URLSearchParams({ q: keyword })
  return `${SEARCH_BASE_URL}${encodeURIComponent(channel)}?${query.toString()}`
}

/**
 * First non-empty line, without a leading "名称：" label.
 */
export function extractTitle(content: string): string {
  const firstLine = content
    .split('\n')
    .map((line) => line.trim())
    .find((line) => line.length > 0)
  if (!firstLine) return ''

  for (const prefix of TITLE_PREFIXES) {
    if (firstLine.startsWith(prefix)) {
      return firstLine.slice(prefix.length).trim()
    }
  }
  return firstLine
}

/**
 * Anchor targets often differ from the visible text (shortened labels),
 * so any href not already in the text is appended on its own line.
 */
export function buildScanText(content: string, hrefs: readonly string[]): string {
  const extra = [...new Set(hrefs)].filter((href) => href && !content.includes(href))
  return extra.length > 0 ? `${content}\n${extra.join('\n')}` : content
}

export function parseChannelPage(body: string, ctx: SourceAdapterContext): SourceEntry[] {
  const $ = loadHtml(body)
  const wraps = $(SELECTORS.messageWrap)

  if (wraps.length === 0 && $(SELECTORS.channelMarker).length === 0) {
    throw new Error('Not a Telegram channel preview page')
  }

  const entries: SourceEntry[] = []
  let skipped = 0

  wraps.each((_, element) => {
    const message = $(element).find(SELECTORS.message).first()
    const parts = (message.attr('data-post') ?? '').split('/')
    const [channel, postId] = parts
    if (parts.length !== 2 || !channel || !postId) {
      skipped++
      return
    }

    const datetime = firstAttr(message, SELECTORS.date, 'datetime')
    const date = datetime ? new Date(datetime) : undefined
    if (!date || Number.isNaN(date.getTime())) {
      skipped++
      return
    }

    const textNode = message.find(SELECTORS.text).first()
    const content = textWithLineBreaks(textNode)
    const hrefs = textNode
      .find(SELECTORS.anchors)
      .toArray()
      .map((anchor) => $(anchor).attr('href')?.trim() ?? '')

    entries.push({
      id: `${channel}_${postId}`,
      title: extractTitle(content),
      content,
      timestamp: date.toISOString(),
      text: buildScanText(content, hrefs),
    })
  })

  if (skipped > 0) {
    ctx.logger.debug('Skipped messages without post id or date', { skipped })
  }

  return entries
}

function uniqueChannels(channels: readonly string[]): string[] {
  return [...new Set(channels.map((c) => c.trim()).filter(Boolean))]
}

export function createTelegramAdapter(channels: readonly string[]): SourceAdapter {
  const configured = uniqueChannels(channels)

  return {
    id: TELEGRAM_SOURCE_ID,
    name: 'Telegram channels',

    buildTargets(keyword: string, scope?: TargetScope): SearchTarget[] {
      const requested = uniqueChannels(scope?.channels ?? [])
      const selected = requested.length > 0 ? requested : configured
      return selected.map((channel) => ({
        source: TELEGRAM_SOURCE_ID,
        url: buildChannelSearchUrl(channel, keyword),
        label: channel,
      }))
    },

    parse(body: string, _target: SearchTarget, ctx: SourceAdapterContext): SourceEntry[] {
      return parseChannelPage(body, ctx)
    },
  }
}
