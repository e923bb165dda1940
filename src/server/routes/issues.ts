import { Router, Request, Response } from 'express';
import { IssueGraph } from '../../core/issue-graph.js';
import { ValidationError } from '../../core/errors.js';
import type { StatusFilter } from '../../types/index.js';

export const issuesRouter = Router();

function graphFor(req: Request): IssueGraph {
  return new IssueGraph(req.store);
}

function statusQuery(value: unknown): StatusFilter {
  if (value === undefined || value === 'all') return 'all';
  if (value === 'open' || value === 'closed') return value;
  throw new ValidationError('status', 'open, closed or all');
}

function idParam(value: string): number {
  const id = Number(value);
  if (!Number.isSafeInteger(id) || id <= 0) {
    throw new ValidationError('id', 'positive integer');
  }
  return id;
}

// List issues
issuesRouter.get('/', (req: Request, res: Response) => {
  const label = typeof req.query.label === 'string' ? req.query.label : undefined;
  const priority = typeof req.query.priority === 'string' ? req.query.priority : undefined;

  res.json(
    graphFor(req).list({
      status: statusQuery(req.query.status),
      label,
      priority,
      includeArchived: req.query.archived === 'true',
    })
  );
});

issuesRouter.get('/ready', (req: Request, res: Response) => {
  res.json(graphFor(req).ready());
});

issuesRouter.get('/blocked', (req: Request, res: Response) => {
  res.json(graphFor(req).blocked());
});

issuesRouter.get('/tree', (req: Request, res: Response) => {
  res.json(graphFor(req).tree({ status: statusQuery(req.query.status) }));
});

issuesRouter.get('/next', (req: Request, res: Response) => {
  res.json(graphFor(req).next());
});

// Issue detail with comments, edges and children
issuesRouter.get('/:id', (req: Request, res: Response) => {
  res.json(graphFor(req).show(idParam(req.params.id)));
});
