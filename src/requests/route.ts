import { Routes } from 'discord.js';

export const DISCORD_API_BASE = 'https://discord.com/api/v10';

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'DELETE';

/** A route with its parameters already filled in. */
export type CompiledRoute = {
  method: HttpMethod;
  path: string;
  /** Encoded query string without the leading `?`; empty when there is none. */
  query: string;
};

export type WebhookExecuteOptions = {
  /** Ask Discord to return the created message (required for a success value). */
  wait?: boolean;
  threadId?: string;
};

export function webhookExecuteRoute(
  webhookId: string,
  webhookToken: string,
  opts: WebhookExecuteOptions = {},
): CompiledRoute {
  const params = new URLSearchParams();
  if (opts.wait !== undefined) params.set('wait', String(opts.wait));
  if (opts.threadId) params.set('thread_id', opts.threadId);
  return { method: 'POST', path: Routes.webhook(webhookId, webhookToken), query: params.toString() };
}

/** Follow-up messages for an interaction go through the application's webhook. */
export function interactionFollowupRoute(applicationId: string, interactionToken: string): CompiledRoute {
  return webhookExecuteRoute(applicationId, interactionToken, { wait: true });
}

export function interactionCallbackRoute(interactionId: string, interactionToken: string): CompiledRoute {
  return { method: 'POST', path: Routes.interactionCallback(interactionId, interactionToken), query: '' };
}

export function routeUrl(route: CompiledRoute, baseUrl: string = DISCORD_API_BASE): string {
  const base = `${baseUrl.replace(/\/+$/, '')}${route.path}`;
  return route.query ? `${base}?${route.query}` : base;
}

// Webhook tokens are credentials; keep them out of logs.
export function redactRoute(route: CompiledRoute): string {
  return `${route.method} ${route.path.replace(/^\/webhooks\/(\d+)\/[^/]+/, '/webhooks/$1/:token')}`;
}
