import express, { type RequestHandler } from 'express';

const parseJson = express.json();

/**
 * `express.json()` that leaves `req.body` undefined when the payload does not parse,
 * so an action in the query string still runs and a bad body reads as no body.
 */
export const lenientJson: RequestHandler = (req, res, next) => {
  parseJson(req, res, (err?: unknown) => {
    if (err instanceof SyntaxError && 'body' in err) {
      req.body = undefined;
      next();
      return;
    }
    next(err);
  });
};
