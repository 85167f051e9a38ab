import type { Logger } from 'pino';
import { z } from 'zod';
import { TableauApiError } from '../../domain/index.js';
import type { Broadcast, BroadcastUpdateFlags, DataSource } from '../../domain/index.js';
import type {
  DatasourceListing,
  TableauClient,
  TableauSession,
} from '../../application/ports.js';

const PAGE_SIZE = 100;

export interface TableauRestOptions {
  readonly serverUrl: string;
  readonly apiVersion: string;
  readonly siteName: string;
}

// Tableau's JSON encodes pagination numbers as strings
const paginationSchema = z.object({
  pageNumber: z.coerce.number().int(),
  pageSize: z.coerce.number().int(),
  totalAvailable: z.coerce.number().int().nonnegative(),
});

const signInSchema = z.object({
  credentials: z.object({
    token: z.string().min(1),
    site: z.object({ id: z.string().min(1) }),
    user: z.object({ id: z.string().min(1) }),
  }),
});

const datasourcePageSchema = z.object({
  pagination: paginationSchema,
  datasources: z.object({
    datasource: z
      .array(
        z.object({
          id: z.string(),
          name: z.string(),
          description: z.string().default(''),
          updatedAt: z.string(),
        }),
      )
      .default([]),
  }),
});

const broadcastPageSchema = z.object({
  pagination: paginationSchema,
  broadcasts: z.object({
    broadcast: z
      .array(
        z.object({
          id: z.string(),
          name: z.string(),
          workbook: z.object({ id: z.string() }),
        }),
      )
      .default([]),
  }),
});

interface Page<T> {
  readonly items: readonly T[];
  readonly totalAvailable: number;
}

interface SendOptions {
  readonly method: 'GET' | 'POST' | 'PUT';
  readonly body?: unknown;
  readonly session?: TableauSession;
}

/**
 * Thin client over the Tableau REST API (JSON flavour).
 *
 * Each public method maps to one documented operation; list calls
 * follow `pagination.totalAvailable` until every page has been read.
 * Any non-2xx answer becomes a {@link TableauApiError}.
 */
export class TableauRestClient implements TableauClient {
  private readonly baseUrl: string;

  constructor(
    private readonly options: TableauRestOptions,
    private readonly log: Logger,
  ) {
    this.baseUrl = `${options.serverUrl}/api/${options.apiVersion}`;
  }

  async signInWithPersonalAccessToken(name: string, secret: string): Promise<TableauSession> {
    return this.signIn({
      personalAccessTokenName: name,
      personalAccessTokenSecret: secret,
    });
  }

  async signInWithJwt(token: string): Promise<TableauSession> {
    return this.signIn({ jwt: token });
  }

  async signOut(session: TableauSession): Promise<void> {
    await this.send('sign-out', '/auth/signout', { method: 'POST', session });
    this.log.debug({ site_id: session.siteId }, 'Tableau session closed');
  }

  async listDatasources(session: TableauSession): Promise<DatasourceListing> {
    const { items, totalAvailable } = await this.paginate(
      'list-datasources',
      `/sites/${session.siteId}/datasources`,
      session,
      (body): Page<DataSource> => {
        const page = datasourcePageSchema.parse(body);
        return {
          items: page.datasources.datasource,
          totalAvailable: page.pagination.totalAvailable,
        };
      },
    );

    return { datasources: items, totalAvailable };
  }

  async listBroadcasts(session: TableauSession): Promise<readonly Broadcast[]> {
    const { items } = await this.paginate(
      'list-broadcasts',
      `/sites/${session.siteId}/broadcasts`,
      session,
      (body): Page<Broadcast> => {
        const page = broadcastPageSchema.parse(body);
        return {
          items: page.broadcasts.broadcast.map((b) => ({
            id: b.id,
            name: b.name,
            workbookId: b.workbook.id,
          })),
          totalAvailable: page.pagination.totalAvailable,
        };
      },
    );

    return items;
  }

  async updateBroadcast(
    session: TableauSession,
    broadcastId: string,
    flags: BroadcastUpdateFlags,
  ): Promise<void> {
    await this.send('update-broadcast', `/sites/${session.siteId}/broadcasts/${broadcastId}`, {
      method: 'PUT',
      session,
      body: {
        broadcast: {
          suspended: flags.suspended,
          notifyViewers: flags.notifyViewers,
        },
      },
    });
  }

  private async signIn(credentials: Record<string, string>): Promise<TableauSession> {
    const response = await this.send('sign-in', '/auth/signin', {
      method: 'POST',
      body: {
        credentials: {
          ...credentials,
          site: { contentUrl: this.options.siteName },
        },
      },
    });

    const { credentials: granted } = signInSchema.parse(await response.json());

    this.log.info(
      { site: this.options.siteName, site_id: granted.site.id },
      'Signed in to Tableau',
    );

    return {
      token: granted.token,
      siteId: granted.site.id,
      userId: granted.user.id,
    };
  }

  private async paginate<T>(
    operation: string,
    path: string,
    session: TableauSession,
    parsePage: (body: unknown) => Page<T>,
  ): Promise<Page<T>> {
    const items: T[] = [];
    let totalAvailable = 0;

    for (let pageNumber = 1; ; pageNumber++) {
      const response = await this.send(
        operation,
        `${path}?pageSize=${PAGE_SIZE}&pageNumber=${pageNumber}`,
        { method: 'GET', session },
      );
      const page = parsePage(await response.json());

      items.push(...page.items);
      totalAvailable = page.totalAvailable;

      if (page.items.length === 0 || items.length >= totalAvailable) break;
    }

    return { items, totalAvailable };
  }

  private async send(operation: string, path: string, options: SendOptions): Promise<Response> {
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (options.body !== undefined) headers['Content-Type'] = 'application/json';
    if (options.session) headers['X-Tableau-Auth'] = options.session.token;

    this.log.debug({ operation, method: options.method, path }, 'Tableau request');

    const response = await fetch(`${this.baseUrl}${path}`, {
      method: options.method,
      headers,
      body: options.body === undefined ? undefined : JSON.stringify(options.body),
    });

    if (!response.ok) {
      throw new TableauApiError(operation, response.status, await response.text());
    }

    return response;
  }
}
