/**
 * @file script-tag.ts
 * @description Renders `<script>` tags with a fixed attribute order
 */

import {SCRIPT_ATTRS} from './constants.js'
import type {ScriptAttrName, ScriptAttrRule, ScriptAttrs} from './types.js'

// Opening tag (attributes matched minimally), body, first closing tag
const SCRIPT_BLOCK_RE = /<script[\s\S]*?>([\s\S]+?)<\/script>/

function formatAttr(
  name: ScriptAttrName,
  rule: ScriptAttrRule,
  value: ScriptAttrs[ScriptAttrName],
): string {
  switch (rule) {
    case 'async':
      // async may be explicitly disabled with an unquoted `false`
      if (value === false || value === 'False') return ` ${name}=false`
      return value ? ` ${name}` : ''
    case 'boolean':
      return value ? ` ${name}` : ''
    case 'string':
      return value ? ` ${name}="${value}"` : ''
  }
}

/**
 * Extracts the body of the first script element when `text` is a full
 * `<script>...</script>` block; otherwise returns `text` as is.
 */
export function unwrapScript(text: string): string {
  const match = SCRIPT_BLOCK_RE.exec(text)
  const body = match?.[1]
  return body === undefined ? text : body.trim()
}

/**
 * @param content - Inline script, bare or wrapped in a script tag. Ignored when `src` is set.
 * @param attrs - Attribute values; unknown or falsy values render nothing
 * @returns The rendered tag, e.g. `<script nonce="abc" async>...</script>`
 */
export function renderScriptTag(
  content?: string | null,
  attrs: ScriptAttrs = {},
): string {
  const attrString = SCRIPT_ATTRS.map(([name, rule]) =>
    formatAttr(name, rule, attrs[name]),
  )
    .join('')
    .trimEnd()

  const body = content && !attrs.src ? unwrapScript(content) : ''
  return `<script${attrString}>${body}</script>`.trim()
}
