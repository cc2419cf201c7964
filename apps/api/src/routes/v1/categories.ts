/**
 * GET /v1/categories - Category choices for the entry form
 *
 * The ledger itself accepts any category; this is only the default picker list
 */

import { Hono } from 'hono';
import { DEFAULT_CATEGORIES } from '@kasbook/types';

const categoriesRoute = new Hono();

categoriesRoute.get('/', (c) => c.json({ categories: [...DEFAULT_CATEGORIES] }));

export { categoriesRoute };
