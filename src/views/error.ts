import { escapeHtml, renderPage } from './layout';

export interface ErrorPageOptions {
  title: string;
  message: string;
  filePath?: string;
}

export function renderErrorPage({ title, message, filePath }: ErrorPageOptions): string {
  const file = filePath === undefined ? '' : `<p class="file">File: <code>${escapeHtml(filePath)}</code></p>`;
  return renderPage({
    title,
    body: `<h1>${escapeHtml(title)}</h1>
<div class="flash flash-error">${escapeHtml(message)}</div>
${file}
<p><a href="/shows">Back to shows</a></p>`
  });
}
