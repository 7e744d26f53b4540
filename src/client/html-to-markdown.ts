/**
 * html-to-markdown.ts — Converts server-rendered status HTML to Markdown.
 *
 * Status content is a small HTML subset: paragraphs, line breaks, links, and
 * microformat markup for mentions and hashtags. Link text is shortened by the
 * server with `invisible` / `ellipsis` spans, which are honoured here.
 */

import { parse, HTMLElement, TextNode, type Node } from 'node-html-parser';

function hasClass(el: HTMLElement, name: string): boolean {
  return el.classList.contains(name);
}

function nodeToMarkdown(node: Node): string {
  if (node instanceof TextNode) {
    return node.text;
  }
  if (!(node instanceof HTMLElement)) {
    return '';
  }

  const el = node;
  const tag = el.tagName?.toLowerCase() ?? '';
  const inner = () => el.childNodes.map(nodeToMarkdown).join('');

  // Hidden URL parts (scheme, tail of long links)
  if (tag === 'span' && hasClass(el, 'invisible')) {
    return '';
  }
  if (tag === 'span' && hasClass(el, 'ellipsis')) {
    return `${inner()}…`;
  }

  switch (tag) {
    case 'a': {
      // Mentions and hashtags already read "@user" / "#tag"
      if (hasClass(el, 'mention') || hasClass(el, 'hashtag')) {
        return inner();
      }
      const href = el.getAttribute('href') ?? '';
      const text = inner();
      return text && text !== href ? `[${text}](${href})` : href;
    }

    case 'strong':
    case 'b':
      return `**${inner()}**`;

    case 'em':
    case 'i':
      return `*${inner()}*`;

    case 'code':
      return `\`${inner()}\``;

    case 'blockquote':
      return `> ${inner()}\n\n`;

    case 'p':
      return `${inner()}\n\n`;

    case 'br':
      return '\n';

    default:
      // Root node, span, and anything unknown: keep the text, drop the tag
      return inner();
  }
}

/**
 * Converts status HTML to Markdown.
 *
 * @returns Markdown with HTML entities decoded and no tags left. Empty string for empty input.
 */
export function htmlToMarkdown(html: string | null | undefined): string {
  const input = html ?? '';
  if (!input.trim()) return '';

  const root = parse(input, {
    lowerCaseTagName: true,
    comment: false,
  });

  let result = nodeToMarkdown(root);

  // Safety net for anything the walk above did not consume
  result = result.replace(/<[^>]+>/g, '');
  result = result.replace(/\n{3,}/g, '\n\n');

  return result.trim();
}
