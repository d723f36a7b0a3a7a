import { FastifyInstance } from 'fastify';
import { stationToFormValues } from '../services/forms';
import { StationService } from '../services/station-service';
import { FormValues } from '../types';
import { takeFlash } from '../utils/flash';
import { renderStationForm, renderStationList } from '../views/stations';
import { redirectWithFlash, respondToDelete, respondToSave, sendHtml } from './respond';

export type StationRoutesOptions = {
  stations: StationService;
};

type StationParams = { Params: { id: string } };

export async function stationRoutes(fastify: FastifyInstance, options: StationRoutesOptions) {
  const { stations } = options;

  const createForm = (values: FormValues, error?: string) =>
    renderStationForm({ mode: 'create', action: '/stations/new', values, error });

  const editForm = (id: string) => (values: FormValues, error?: string) =>
    renderStationForm({ mode: 'edit', action: `/stations/${encodeURIComponent(id)}/edit`, values, error });

  // GET /stations
  fastify.get('/stations', async (request, reply) => {
    const flash = takeFlash(request, reply);
    return sendHtml(
      reply,
      renderStationList({ stations: stations.listStations(), referenceCounts: stations.referenceCounts(), flash })
    );
  });

  // GET /stations/new
  fastify.get('/stations/new', async (request, reply) => {
    return sendHtml(reply, createForm({}));
  });

  // POST /stations/new
  fastify.post('/stations/new', async (request, reply) => {
    return respondToSave(reply, stations.saveStation(request.body), '/stations', createForm);
  });

  // GET /stations/:id/edit
  fastify.get<StationParams>('/stations/:id/edit', async (request, reply) => {
    const { id } = request.params;
    const station = stations.getStation(id);
    if (!station) {
      return redirectWithFlash(reply, '/stations', 'error', `Station '${id}' was not found.`);
    }
    return sendHtml(reply, editForm(id)(stationToFormValues(station)));
  });

  // POST /stations/:id/edit
  fastify.post<StationParams>('/stations/:id/edit', async (request, reply) => {
    const { id } = request.params;
    return respondToSave(reply, stations.saveStation(request.body, id), '/stations', editForm(id));
  });

  // POST /stations/:id/delete
  fastify.post<StationParams>('/stations/:id/delete', async (request, reply) => {
    return respondToDelete(reply, stations.deleteStation(request.params.id), '/stations');
  });
}
