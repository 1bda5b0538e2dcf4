import * as cheerio from 'cheerio'
import type { AnyNode } from 'domhandler'

export function loadHtml(payload: string): cheerio.CheerioAPI {
  return cheerio.load(payload)
}

export function firstAttr(
  scope: cheerio.Cheerio<AnyNode>,
  selector: string,
  attr: string
): string | undefined {
  const value = scope.find(selector).first().attr(attr)?.trim()
  return value || undefined
}

/**
 * Text of a node with `<br>` turned into newlines, trimmed per line.
 * Works on a clone; the document is left untouched.
 */
export function textWithLineBreaks(node: cheerio.Cheerio<AnyNode>): string {
  const clone = node.clone()
  clone.find('br').replaceWith('\n')
  return clone
    .text()
    .split('\n')
    .map((line) => line.trim())
    .join('\n')
    .trim()
}
