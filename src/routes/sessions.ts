import { NextFunction, Request, Response, Router } from 'express';
import multer from 'multer';
import { isStage, STAGES } from '../analysis/types';
import { ValidationError } from '../errors';
import { LeadAction, SessionContext } from '../flow/machine';
import { describeSession } from '../flow/report';
import { AnalysisFailedError, FlowService } from '../flow/service';

function isPdf(file: Express.Multer.File): boolean {
  return file.mimetype === 'application/pdf' || file.originalname.toLowerCase().endsWith('.pdf');
}

function parseLeadAction(body: unknown): LeadAction {
  if (typeof body !== 'object' || body === null) {
    throw new ValidationError('Request body must be an object');
  }
  if ('bulk' in body && body.bulk === true) {
    return { type: 'bulk' };
  }
  const docIndex = 'docIndex' in body ? body.docIndex : undefined;
  if (typeof docIndex !== 'number' || !Number.isInteger(docIndex) || docIndex < 0) {
    throw new ValidationError('Provide docIndex (a non-negative integer) or bulk: true');
  }
  return { type: 'document', index: docIndex };
}

export function sessionRoutes(flow: FlowService, uploadMaxBytes: number): Router {
  const router = Router();

  // Kept in memory: the bytes only reach disk as a temp file during analysis.
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: uploadMaxBytes,
    },
    fileFilter: (req, file, cb) => {
      if (isPdf(file)) {
        cb(null, true);
      } else {
        cb(new ValidationError('Only PDF files are accepted'));
      }
    },
  });

  const send = (res: Response, ctx: SessionContext, status = 200) => {
    res.status(status).json({ session: describeSession(ctx, flow.pricing) });
  };

  // Start a session
  router.post('/', (req: Request, res: Response) => {
    send(res, flow.create(), 201);
  });

  router.get('/:id', (req: Request, res: Response, next: NextFunction) => {
    try {
      send(res, flow.get(req.params.id));
    } catch (error) {
      next(error);
    }
  });

  // End a session (the paywall goes with it)
  router.delete('/:id', (req: Request, res: Response) => {
    const deleted = flow.end(req.params.id);
    if (!deleted) {
      return res.status(404).json({ error: 'Session not found' });
    }
    res.json({ success: true });
  });

  router.post('/:id/disclaimer', (req: Request, res: Response, next: NextFunction) => {
    try {
      send(res, flow.acceptDisclaimer(req.params.id));
    } catch (error) {
      next(error);
    }
  });

  router.post('/:id/stage', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { stage } = req.body ?? {};
      if (!isStage(stage)) {
        throw new ValidationError(`Stage must be one of: ${STAGES.join(', ')}`);
      }
      send(res, flow.selectStage(req.params.id, stage));
    } catch (error) {
      next(error);
    }
  });

  // Upload the deed
  router.post('/:id/document', upload.single('document'), (req: Request, res: Response, next: NextFunction) => {
    try {
      const file = req.file;
      if (!file) {
        throw new ValidationError('No file uploaded');
      }
      send(
        res,
        flow.attachDocument(req.params.id, { originalName: file.originalname, size: file.size, bytes: file.buffer }),
      );
    } catch (error) {
      next(error);
    }
  });

  router.post('/:id/analyze', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { apiKey } = req.body ?? {};
      const ctx = await flow.analyze(req.params.id, typeof apiKey === 'string' ? apiKey : undefined);
      send(res, ctx);
    } catch (error) {
      if (error instanceof AnalysisFailedError) {
        return res.status(502).json({
          error: `AI Error: ${error.message}`,
          analysisError: error.analysisError,
          session: describeSession(error.session, flow.pricing),
        });
      }
      next(error);
    }
  });

  // Simulated payment
  router.post('/:id/unlock', async (req: Request, res: Response, next: NextFunction) => {
    try {
      send(res, await flow.unlock(req.params.id));
    } catch (error) {
      next(error);
    }
  });

  router.post('/:id/lead', (req: Request, res: Response, next: NextFunction) => {
    try {
      send(res, flow.openLead(req.params.id, parseLeadAction(req.body)));
    } catch (error) {
      next(error);
    }
  });

  router.post('/:id/lead/submit', async (req: Request, res: Response, next: NextFunction) => {
    try {
      send(res, await flow.submitLead(req.params.id, req.body ?? {}), 201);
    } catch (error) {
      next(error);
    }
  });

  router.delete('/:id/lead', (req: Request, res: Response, next: NextFunction) => {
    try {
      send(res, flow.closeLead(req.params.id));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
