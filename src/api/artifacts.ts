/**
 * Artifact inspection routes.
 *
 * GET /artifacts       — Snapshot of the store (optional ?name= and ?kind= filters)
 * GET /artifacts/:uid  — One artifact
 */

import { Router } from 'express';
import { isArtifactKind } from '../domain/artifact';
import { apiError, createTypedError } from '../domain/errors';
import { ArtifactStore } from '../storage/artifact-store';

export function createArtifactRoutes(store: ArtifactStore): Router {
  const router = Router();

  router.get('/artifacts', (req, res) => {
    const { name, kind } = req.query;

    if (kind !== undefined && (typeof kind !== 'string' || !isArtifactKind(kind))) {
      res.status(400).json(
        apiError(
          createTypedError({
            code: 'VALIDATION.INVALID_KIND',
            message: `Unknown artifact kind: ${String(kind)}`,
            retryable: false,
            details: { allowed: ['data', 'tool', 'agent'] },
          }),
        ),
      );
      return;
    }

    const snapshot = store.snapshot(kind);
    const artifacts =
      typeof name === 'string'
        ? Object.fromEntries(Object.entries(snapshot).filter(([, entry]) => entry.metadata.name === name))
        : snapshot;

    res.json({ count: Object.keys(artifacts).length, artifacts });
  });

  // NotFoundError from the store reaches the error handler as a 404.
  router.get('/artifacts/:uid', (req, res) => {
    res.json({ uid: req.params.uid, ...store.entry(req.params.uid) });
  });

  return router;
}
