/** Route aggregator. */
import express from 'express';
import { createFlightsRouter, type FlightsRouterDeps } from './flights';

export function createApiRouter(deps: FlightsRouterDeps) {
  const router = express.Router();
  router.use('/flights', createFlightsRouter(deps));
  return router;
}
