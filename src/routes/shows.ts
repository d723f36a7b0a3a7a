import { FastifyInstance } from 'fastify';
import { showToFormValues } from '../services/forms';
import { ShowService } from '../services/show-service';
import { StationService } from '../services/station-service';
import { FormValues } from '../types';
import { takeFlash } from '../utils/flash';
import { renderShowForm, renderShowList } from '../views/shows';
import { redirectWithFlash, respondToDelete, respondToSave, sendHtml } from './respond';

export type ShowRoutesOptions = {
  shows: ShowService;
  stations: StationService;
};

type ShowParams = { Params: { key: string } };

export async function showRoutes(fastify: FastifyInstance, options: ShowRoutesOptions) {
  const { shows, stations } = options;

  const editPath = (key: string) => `/shows/${encodeURIComponent(key)}/edit`;

  const createForm = (values: FormValues, error?: string) =>
    renderShowForm({ mode: 'create', action: '/shows/new', values, stationIds: stations.stationIds(), error });

  const editForm = (key: string) => (values: FormValues, error?: string) =>
    renderShowForm({ mode: 'edit', action: editPath(key), values, stationIds: stations.stationIds(), error });

  // GET /shows
  fastify.get('/shows', async (request, reply) => {
    const flash = takeFlash(request, reply);
    const knownStations = new Set(stations.stationIds());
    return sendHtml(reply, renderShowList({ shows: shows.listShows(), knownStations, flash }));
  });

  // GET /shows/new
  fastify.get('/shows/new', async (request, reply) => {
    return sendHtml(reply, createForm({}));
  });

  // POST /shows/new
  fastify.post('/shows/new', async (request, reply) => {
    return respondToSave(reply, shows.saveShow(request.body), '/shows', createForm);
  });

  // GET /shows/:key/edit
  fastify.get<ShowParams>('/shows/:key/edit', async (request, reply) => {
    const { key } = request.params;
    const show = shows.getShow(key);
    if (!show) {
      return redirectWithFlash(reply, '/shows', 'error', `Show '${key}' was not found.`);
    }
    return sendHtml(reply, editForm(key)(showToFormValues(show)));
  });

  // POST /shows/:key/edit
  fastify.post<ShowParams>('/shows/:key/edit', async (request, reply) => {
    const { key } = request.params;
    return respondToSave(reply, shows.saveShow(request.body, key), '/shows', editForm(key));
  });

  // POST /shows/:key/delete
  fastify.post<ShowParams>('/shows/:key/delete', async (request, reply) => {
    return respondToDelete(reply, shows.deleteShow(request.params.key), '/shows');
  });
}
