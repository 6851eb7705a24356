/**
 * HTTP API
 *
 * Thin Express handlers: read the session and the untrusted body, call the
 * core with an explicit user id, map the result to a response.
 */

import express, {Express, NextFunction, Request, RequestHandler, Response} from 'express';
import {AppEffects} from '../pure/effects';
import {describeError, OrderingError} from '../pure/errors';
import {login, logout, register} from '../pure/accounts';
import {browseCatalog, getItemDetails} from '../pure/catalog';
import {addItem, removeItem, viewCart} from '../pure/cartStore';
import {listOrders, placeOrder} from '../pure/orderProcessing';
import {authOf, requireSession, SESSION_COOKIE} from './session';

export type HttpOptions = {
  readonly sessionTtlSeconds: number;
};

export function statusFor(error: OrderingError): number {
  switch (error.type) {
    case 'validation':
      return 400;
    case 'invalid_credentials':
      return 401;
    case 'unauthorized':
      return 403;
    case 'cart_line_not_found':
    case 'item_not_found':
      return 404;
    case 'empty_cart':
    case 'duplicate_account':
      return 409;
  }
}

function sendError(res: Response, error: OrderingError): void {
  res.status(statusFor(error)).json({error: describeError(error), type: error.type});
}

function handle(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

export function createApp(effects: AppEffects, options: HttpOptions): Express {
  const app = express();

  app.use(express.json());
  app.use(express.urlencoded({extended: false}));

  app.get('/health', (req, res) => {
    res.json({status: 'healthy', service: 'ordering-core'});
  });

  // ========== Accounts ==========

  app.post('/register', handle(async (req, res) => {
    const result = await register(req.body)(effects);
    result.caseOf({
      Left: (error) => sendError(res, error),
      Right: (user) => {
        res.status(201).json({id: user.id, fullName: user.fullName});
      },
    });
  }));

  app.post('/login', handle(async (req, res) => {
    const result = await login(req.body)(effects);
    result.caseOf({
      Left: (error) => sendError(res, error),
      Right: ({sessionId, user}) => {
        res.cookie(SESSION_COOKIE, sessionId, {
          httpOnly: true,
          sameSite: 'lax',
          maxAge: options.sessionTtlSeconds * 1000,
        });
        res.json({id: user.id, fullName: user.fullName});
      },
    });
  }));

  // Everything below needs a session
  app.use(requireSession(effects));

  app.post('/logout', handle(async (req, res) => {
    await logout(authOf(req).sessionId)(effects);
    res.clearCookie(SESSION_COOKIE);
    res.status(204).end();
  }));

  // ========== Catalog ==========

  app.get('/services', handle(async (req, res) => {
    res.json(await browseCatalog('service')(effects));
  }));

  app.get('/menu', handle(async (req, res) => {
    res.json(await browseCatalog('menu')(effects));
  }));

  app.get('/get_item_details/:item_type/:item_id', handle(async (req, res) => {
    const result = await getItemDetails(req.params)(effects);
    result.caseOf({
      Left: (error) => sendError(res, error),
      Right: (item) => {
        res.json(item);
      },
    });
  }));

  // ========== Cart ==========

  app.post('/add_to_cart', handle(async (req, res) => {
    const result = await addItem(authOf(req).userId, req.body)(effects);
    result.caseOf({
      Left: (error) => {
        res.status(statusFor(error)).json({success: false, error: describeError(error)});
      },
      Right: (cartLine) => {
        res.json({success: true, cartLine});
      },
    });
  }));

  app.get('/cart', handle(async (req, res) => {
    res.json(await viewCart(authOf(req).userId)(effects));
  }));

  app.post('/remove_from_cart/:cart_line_id', handle(async (req, res) => {
    const result = await removeItem(authOf(req).userId, req.params.cart_line_id)(effects);
    result.caseOf({
      Left: (error) => sendError(res, error),
      Right: () => {
        res.status(204).end();
      },
    });
  }));

  // ========== Orders ==========

  app.post('/place_order', handle(async (req, res) => {
    const result = await placeOrder(authOf(req).userId, req.body)(effects);
    result.caseOf({
      Left: (error) => {
        if (error.type === 'empty_cart') {
          res.redirect(303, '/cart?notice=empty-cart');
          return;
        }
        sendError(res, error);
      },
      Right: ({order, skippedLines}) => {
        res.status(201).json({
          orderId: order.id,
          totalAmount: order.totalAmount,
          status: order.status,
          lines: order.lines.length,
          skippedLines: skippedLines.length,
        });
      },
    });
  }));

  app.get('/order_history', handle(async (req, res) => {
    res.json(await listOrders(authOf(req).userId)(effects));
  }));

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    console.error(`❌ ${req.method} ${req.path} failed:`, error);
    res.status(500).json({error: 'Internal server error'});
  });

  return app;
}
