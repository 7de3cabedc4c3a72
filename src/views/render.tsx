import type { ReactElement } from 'react';
import { renderToStaticMarkup } from 'react-dom/server';

export function renderPage(page: ReactElement): string {
  return '<!DOCTYPE html>' + renderToStaticMarkup(page);
}

/** Concatenates HTMX fragments; the first is the swap target, the rest carry hx-swap-oob. */
export function renderFragments(...fragments: ReactElement[]): string {
  return fragments.map((f) => renderToStaticMarkup(f)).join('\n');
}
