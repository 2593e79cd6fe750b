import { z } from 'zod';
import { logger } from '../shared/logger.js';
import { CancelledError } from '../shared/errors.js';
import type { StaticFetcher } from '../crawl/staticFetcher.js';
import type { DelayPolicy } from '../crawl/delay.js';

const ProductSchema = z
  .object({
    id: z.number(),
    title: z.string().default(''),
    price: z.number().default(0),
    description: z.string().default(''),
    category: z.string().default(''),
    image: z.string().default(''),
    rating: z.object({ rate: z.number().default(0), count: z.number().default(0) }).partial().optional(),
  })
  .passthrough();

const UserSchema = z
  .object({
    id: z.number(),
    email: z.string().default(''),
    username: z.string().default(''),
    phone: z.string().default(''),
    name: z.object({ firstname: z.string(), lastname: z.string() }).partial().optional(),
    address: z.object({ city: z.string(), street: z.string(), zipcode: z.string() }).partial().optional(),
  })
  .passthrough();

const CartSchema = z
  .object({
    id: z.number(),
    userId: z.number(),
    date: z.string().default(''),
    products: z.array(z.object({ productId: z.number(), quantity: z.number() })).default([]),
  })
  .passthrough();

export type CatalogProduct = z.infer<typeof ProductSchema>;
export type CatalogUser = z.infer<typeof UserSchema>;
export type CatalogCart = z.infer<typeof CartSchema>;

export interface CatalogData {
  raw: { products: unknown[]; users: unknown[]; carts: unknown[] };
  tables: {
    catalog_products: Array<Record<string, string | number>>;
    catalog_users: Array<Record<string, string | number>>;
    catalog_cart_items: Array<Record<string, string | number>>;
  };
}

async function fetchList<T>(
  fetcher: StaticFetcher,
  url: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  signal?: AbortSignal,
): Promise<{ raw: unknown[]; items: T[] }> {
  try {
    const body = await fetcher.fetchJson(url, signal);
    const parsed = z.array(z.unknown()).safeParse(body);
    if (!parsed.success) {
      logger.warn({ url }, 'Catalog endpoint did not return an array');
      return { raw: [], items: [] };
    }
    const items: T[] = [];
    for (const entry of parsed.data) {
      const item = schema.safeParse(entry);
      if (item.success) {
        items.push(item.data);
      } else {
        logger.debug({ url, issues: item.error.issues.length }, 'Skipping malformed catalog entry');
      }
    }
    return { raw: parsed.data, items };
  } catch (err) {
    if (err instanceof CancelledError) throw err;
    logger.warn({ url, error: err instanceof Error ? err.message : String(err) }, 'Catalog fetch failed');
    return { raw: [], items: [] };
  }
}

export function flattenProducts(products: CatalogProduct[]): CatalogData['tables']['catalog_products'] {
  return products.map((p) => ({
    id: p.id,
    title: p.title,
    price: p.price,
    category: p.category,
    description: p.description,
    image: p.image,
    rating_rate: p.rating?.rate ?? 0,
    rating_count: p.rating?.count ?? 0,
  }));
}

export function flattenUsers(users: CatalogUser[]): CatalogData['tables']['catalog_users'] {
  return users.map((u) => ({
    id: u.id,
    email: u.email,
    username: u.username,
    first_name: u.name?.firstname ?? '',
    last_name: u.name?.lastname ?? '',
    city: u.address?.city ?? '',
    phone: u.phone,
  }));
}

export function flattenCarts(carts: CatalogCart[]): CatalogData['tables']['catalog_cart_items'] {
  return carts.flatMap((c) =>
    c.products.map((line) => ({
      cart_id: c.id,
      user_id: c.userId,
      cart_date: c.date,
      product_id: line.productId,
      quantity: line.quantity,
    })),
  );
}

/**
 * Products, users and carts from the sample catalog API, paced like any other
 * crawl. A failing endpoint contributes an empty table.
 */
export async function fetchCatalog(
  fetcher: StaticFetcher,
  delay: DelayPolicy,
  baseUrl: string,
  signal?: AbortSignal,
): Promise<CatalogData> {
  const base = baseUrl.replace(/\/+$/, '');

  logger.info({ baseUrl: base }, 'Fetching catalog products');
  const products = await fetchList(fetcher, `${base}/products`, ProductSchema, signal);
  await delay.wait(signal);

  logger.info({ baseUrl: base }, 'Fetching catalog users');
  const users = await fetchList(fetcher, `${base}/users`, UserSchema, signal);
  await delay.wait(signal);

  logger.info({ baseUrl: base }, 'Fetching catalog carts');
  const carts = await fetchList(fetcher, `${base}/carts`, CartSchema, signal);

  return {
    raw: { products: products.raw, users: users.raw, carts: carts.raw },
    tables: {
      catalog_products: flattenProducts(products.items),
      catalog_users: flattenUsers(users.items),
      catalog_cart_items: flattenCarts(carts.items),
    },
  };
}
