import DOMPurify from 'dompurify';
import { JSDOM } from 'jsdom';
import { marked } from 'marked';
import { escapeHtml } from '@/features/mail/utils';

const ALLOWED_LINK_PROTOCOLS = new Set(['https:', 'http:', 'mailto:']);

const purify = DOMPurify(new JSDOM('').window);

function isElement(node: Node): node is Element {
  return node.nodeType === 1;
}

/**
 * Sanitize HTML for message body rendering.
 * Strict policy: no scripts, no styles, no event handlers.
 * Links get rel="noopener noreferrer" and only https/http/mailto allowed.
 */
export function sanitizeHtml(html: string): string {
  purify.addHook('afterSanitizeAttributes', (node) => {
    if (!isElement(node) || node.tagName !== 'A') return;
    if (node.getAttribute('target') === '_blank') {
      node.setAttribute('rel', 'noopener noreferrer');
    }
    const href = node.getAttribute('href');
    if (href === null) return;
    try {
      const u = new URL(href, 'https://example.com');
      if (!ALLOWED_LINK_PROTOCOLS.has(u.protocol)) {
        node.removeAttribute('href');
      }
    } catch {
      node.removeAttribute('href');
    }
  });
  try {
    return purify.sanitize(html, {
      ALLOWED_TAGS: [
        'p', 'br', 'div', 'span', 'a', 'strong', 'b', 'em', 'i', 'u', 's', 'del', 'ul', 'ol', 'li',
        'h1', 'h2', 'h3', 'h4', 'h5', 'h6', 'blockquote', 'pre', 'code', 'hr', 'table', 'thead', 'tbody', 'tr', 'th', 'td',
        'img', 'input',
      ],
      ALLOWED_ATTR: ['href', 'title', 'target', 'rel', 'src', 'alt', 'width', 'height', 'type', 'checked', 'disabled'],
      FORBID_TAGS: ['script', 'style', 'iframe', 'object', 'embed'],
      FORBID_ATTR: ['onerror', 'onload', 'onclick', 'onmouseover'],
      ALLOW_DATA_ATTR: false,
      ALLOW_UNKNOWN_PROTOCOLS: false,
    });
  } finally {
    purify.removeHook('afterSanitizeAttributes');
  }
}

/**
 * Markdown body to sanitized HTML (GFM, single newlines become <br>).
 * A parse failure degrades to escaped text with line breaks.
 */
export function renderMarkdownSafe(markdown: string | null | undefined): string {
  if (!markdown) return '';
  let html: string;
  try {
    const parsed = marked.parse(markdown, { async: false, breaks: true, gfm: true });
    html = typeof parsed === 'string' ? parsed : escapeHtml(markdown).replace(/\n/g, '<br>');
  } catch (error) {
    console.error('[render] markdown parse failed', error);
    html = escapeHtml(markdown).replace(/\n/g, '<br>');
  }
  return sanitizeHtml(html);
}
