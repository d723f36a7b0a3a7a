import { FlashMessage, FormValues, SHOW_FIELDS, Show } from '../types';
import { escapeHtml, pathSegment, renderDeleteButton, renderPage, renderTextInput } from './layout';

export interface ShowListOptions {
  shows: Show[];
  knownStations: Set<string>;
  flash?: FlashMessage[];
}

function renderShowRow(show: Show, knownStations: Set<string>): string {
  const { entry } = show;
  const station = entry.station ?? '';
  const unknown = knownStations.has(station)
    ? ''
    : ' <span class="badge badge-warning" title="No station with this ID">unknown station</span>';
  const segment = pathSegment(show.key);

  return `<tr>
<td>${escapeHtml(show.key)}</td>
<td>${escapeHtml(entry.show ?? '')}</td>
<td>${escapeHtml(station)}${unknown}</td>
<td>${escapeHtml(entry.frequency ?? '')}</td>
<td>${escapeHtml(entry['remote-directory'] ?? '')}</td>
<td class="actions"><a href="/shows/${segment}/edit">Edit</a> ${renderDeleteButton(`/shows/${segment}/delete`, 'Delete')}</td>
</tr>`;
}

export function renderShowList({ shows, knownStations, flash }: ShowListOptions): string {
  const table = shows.length === 0
    ? '<p class="empty">No shows configured yet.</p>'
    : `<table>
<thead><tr><th>Slug</th><th>Show name</th><th>Station</th><th>Frequency</th><th>Remote directory</th><th></th></tr></thead>
<tbody>
${shows.map((show) => renderShowRow(show, knownStations)).join('\n')}
</tbody>
</table>`;

  return renderPage({
    title: 'Shows',
    section: 'shows',
    flash,
    body: `<div class="page-header"><h1>Shows</h1><a class="button" href="/shows/new">Add show</a></div>
${table}`
  });
}

export interface ShowFormOptions {
  mode: 'create' | 'edit';
  action: string;
  values: FormValues;
  stationIds: string[];
  error?: string;
}

// The current value stays selectable even when no station of that ID exists
function renderStationSelect(selected: string, stationIds: string[]): string {
  const choices = selected === '' || stationIds.includes(selected) ? stationIds : [selected, ...stationIds];
  const options = choices
    .map((id) => `<option value="${escapeHtml(id)}"${id === selected ? ' selected' : ''}>${escapeHtml(id)}</option>`)
    .join('\n');

  return `<label for="station">Station</label>
<select id="station" name="station" required>
<option value="">Select a station</option>
${options}
</select>`;
}

export function renderShowForm({ mode, action, values, stationIds, error }: ShowFormOptions): string {
  const title = mode === 'create' ? 'New show' : 'Edit show';
  const fields = SHOW_FIELDS.map(({ input, label }) =>
    input === 'station'
      ? renderStationSelect(values.station ?? '', stationIds)
      : renderTextInput({ name: input, label, value: values[input] ?? '' })
  );

  return renderPage({
    title,
    section: 'shows',
    flash: error === undefined ? [] : [{ level: 'error', message: error }],
    body: `<h1>${title}</h1>
<form method="post" action="${escapeHtml(action)}" class="config-form">
${renderTextInput({ name: 'show_key', label: 'Slug', value: values.show_key ?? '' })}
${fields.join('\n')}
<div class="form-actions"><button type="submit">Save</button> <a href="/shows">Cancel</a></div>
</form>`
  });
}
