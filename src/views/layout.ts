import { FlashMessage } from '../types';

export type Section = 'shows' | 'stations';

export interface PageOptions {
  title: string;
  section?: Section;
  flash?: FlashMessage[];
  body: string;
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

// Path segment for a show key or station ID, safe inside an attribute
export function pathSegment(value: string): string {
  return escapeHtml(encodeURIComponent(value));
}

export function renderFlash(messages: FlashMessage[]): string {
  return messages
    .map((flash) => `<div class="flash flash-${flash.level}">${escapeHtml(flash.message)}</div>`)
    .join('\n');
}

function navLink(href: string, label: string, active: boolean): string {
  return `<a href="${href}"${active ? ' class="active"' : ''}>${label}</a>`;
}

export function renderPage({ title, section, flash = [], body }: PageOptions): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>${escapeHtml(title)} | Recorder Admin</title>
<link rel="stylesheet" href="/static/styles.css">
</head>
<body>
<header class="topbar">
<a class="brand" href="/">Recorder Admin</a>
<nav>${navLink('/shows', 'Shows', section === 'shows')}${navLink('/stations', 'Stations', section === 'stations')}</nav>
</header>
<main>
${renderFlash(flash)}
${body}
</main>
</body>
</html>
`;
}

export interface TextInputOptions {
  name: string;
  label: string;
  value: string;
  type?: 'text' | 'url';
}

export function renderTextInput({ name, label, value, type = 'text' }: TextInputOptions): string {
  return `<label for="${name}">${escapeHtml(label)}</label>
<input id="${name}" name="${name}" type="${type}" value="${escapeHtml(value)}" required>`;
}

export function renderDeleteButton(action: string, label: string): string {
  return `<form method="post" action="${action}" class="inline"><button type="submit" class="danger">${escapeHtml(label)}</button></form>`;
}
