import escapeHtml from 'escape-html';
import jsesc from 'jsesc';

export { escapeHtml };

/**
 * Double-quoted JavaScript string literal that is safe inside a <script> element.
 */
export function jsStringLiteral(value: string): string {
  return jsesc(value, { quotes: 'double', wrap: true, isScriptContext: true });
}

export function checkedAttr(checked: boolean): string {
  return checked ? ' checked' : '';
}

export function joinHtml(parts: Iterable<string>): string {
  return Array.from(parts).join('\n');
}
