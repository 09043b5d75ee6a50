/**
 * @fileoverview Atlassian Document Format conversion
 * @module @tracklane/jira-client/adf
 */

import type { JiraDocument, JiraDocumentNode, JiraRichText } from './types.js';

/**
 * Converts plain text to an ADF document, one paragraph per line
 */
export function textToAdf(text: string): JiraDocument {
  return {
    version: 1,
    type: 'doc',
    content: text.split('\n').map((line) => ({
      type: 'paragraph',
      content: line ? [{ type: 'text', text: line }] : [],
    })),
  };
}

/**
 * Converts ADF (or v2 plain text) to plain text
 */
export function adfToText(doc: JiraRichText | null | undefined): string | undefined {
  if (doc === null || doc === undefined) return undefined;
  if (typeof doc === 'string') return doc;
  if (!doc.content) return undefined;

  const extractText = (nodes: JiraDocumentNode[]): string => {
    return nodes
      .map((node) => {
        if (node.type === 'text' && node.text) {
          return node.text;
        }
        if (node.content) {
          return extractText(node.content);
        }
        if (node.type === 'hardBreak') {
          return '\n';
        }
        return '';
      })
      .join('');
  };

  return doc.content
    .map((block) => {
      if (block.content) {
        return extractText(block.content);
      }
      return '';
    })
    .join('\n');
}

/**
 * Body for a rich-text field: ADF on API v3, the raw string on v2
 */
export function toRichText(text: string, apiVersion: '2' | '3'): JiraRichText {
  return apiVersion === '3' ? textToAdf(text) : text;
}
