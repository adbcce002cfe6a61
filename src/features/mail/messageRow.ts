import type { OverviewMessage } from './types';
import { escapeHtml, formatImportanceLabel, formatTimestamp, highlightText } from './utils';

export interface RowOptions {
  selectedId?: number | null;
  highlight?: string;
  now?: number;
}

/** One list row. Every snapshot-derived string is escaped. */
export function buildMessageRow(msg: OverviewMessage, index: number, options: RowOptions = {}): string {
  const selected = options.selectedId === msg.id;
  const importance = msg.importance === 'urgent' || msg.importance === 'high'
    ? `<span class="badge badge-${msg.importance}">${formatImportanceLabel(msg.importance)}</span>`
    : '';
  return (
    `<div class="message-row${selected ? ' selected' : ''}" data-message-id="${msg.id}" data-index="${index}" tabindex="0" role="button"` +
    ` aria-label="Message from ${escapeHtml(msg.sender)}: ${escapeHtml(msg.subject)}">` +
    `<div class="row-head"><span class="sender">${escapeHtml(msg.sender)}</span>` +
    `<span class="recipients">${escapeHtml(msg.recipients)}</span></div>` +
    `<div class="row-tags"><span class="project" title="${escapeHtml(msg.projectName)}">${escapeHtml(msg.projectName)}</span>${importance}</div>` +
    `<div class="subject">${highlightText(msg.subject, options.highlight)}</div>` +
    `<div class="excerpt">${escapeHtml(msg.excerpt)}</div>` +
    `<div class="timestamp">${escapeHtml(formatTimestamp(msg.createdTs, options.now))}</div>` +
    `</div>`
  );
}
