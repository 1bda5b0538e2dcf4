/**
 * Telegram public channel preview (t.me/s/<channel>) selectors.
 */

export const SELECTORS = {
  // One per message
  messageWrap: '.tgme_widget_message_wrap',
  message: '.tgme_widget_message[data-post]',
  date: '.tgme_widget_message_date time[datetime]',
  text: '.tgme_widget_message_text',
  anchors: 'a[href]',

  // Present on every channel preview page, even with zero matches
  channelMarker: '.tgme_channel_history, .tgme_channel_info, .tgme_page',
} as const

export const TITLE_PREFIXES = ['名称：', '名称:'] as const

export const SEARCH_BASE_URL = 'https://t.me/s/'
