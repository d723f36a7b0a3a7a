import { FlashMessage, FormValues, Station } from '../types';
import { escapeHtml, pathSegment, renderDeleteButton, renderPage, renderTextInput } from './layout';

export interface StationListOptions {
  stations: Station[];
  referenceCounts: Map<string, number>;
  flash?: FlashMessage[];
}

export function renderStationList({ stations, referenceCounts, flash }: StationListOptions): string {
  const rows = stations.map((station) => {
    const segment = pathSegment(station.id);
    return `<tr>
<td>${escapeHtml(station.id)}</td>
<td class="url">${escapeHtml(station.streamUrl)}</td>
<td>${referenceCounts.get(station.id) ?? 0}</td>
<td class="actions"><a href="/stations/${segment}/edit">Edit</a> ${renderDeleteButton(`/stations/${segment}/delete`, 'Delete')}</td>
</tr>`;
  });

  const table = stations.length === 0
    ? '<p class="empty">No stations configured yet.</p>'
    : `<table>
<thead><tr><th>Station ID</th><th>Stream URL</th><th>Shows</th><th></th></tr></thead>
<tbody>
${rows.join('\n')}
</tbody>
</table>`;

  return renderPage({
    title: 'Stations',
    section: 'stations',
    flash,
    body: `<div class="page-header"><h1>Stations</h1><a class="button" href="/stations/new">Add station</a></div>
${table}`
  });
}

export interface StationFormOptions {
  mode: 'create' | 'edit';
  action: string;
  values: FormValues;
  error?: string;
}

export function renderStationForm({ mode, action, values, error }: StationFormOptions): string {
  const title = mode === 'create' ? 'New station' : 'Edit station';
  const renameNote = mode === 'edit'
    ? '<p class="hint">Changing the ID also updates every show that records from this station.</p>'
    : '';

  return renderPage({
    title,
    section: 'stations',
    flash: error === undefined ? [] : [{ level: 'error', message: error }],
    body: `<h1>${title}</h1>
${renameNote}
<form method="post" action="${escapeHtml(action)}" class="config-form">
${renderTextInput({ name: 'station_id', label: 'Station ID', value: values.station_id ?? '' })}
${renderTextInput({ name: 'stream_url', label: 'Stream URL', value: values.stream_url ?? '', type: 'url' })}
<div class="form-actions"><button type="submit">Save</button> <a href="/stations">Cancel</a></div>
</form>`
  });
}
