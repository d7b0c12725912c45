/**
 * Client dispatch
 *
 * `send` performs exactly one round trip through the configured transport.
 * Retries, backoff and cancellation belong to the transport, not here.
 */

import { GraphQLClient } from "graphql-request";

import { printRequest } from "./request";
import { decodeResponse } from "./response";

import type { QueryRequest } from "./request";
import type { ResponseOf } from "./selection";

/**
 * What a transport receives for one request
 */
export interface Operation {
  /** GraphQL document text */
  query: string;
  operationName?: string;
}

/**
 * Sends an operation and resolves with the response's `data` payload
 */
export type Transport = (operation: Operation) => Promise<unknown>;

export interface ClientOptions {
  transport: Transport;
}

export interface Client {
  /** Send a request and decode its response */
  send<S>(request: QueryRequest<S>): Promise<ResponseOf<S>>;
}

export function createClient(options: ClientOptions): Client {
  const { transport } = options;

  return {
    async send(request) {
      const data = await transport({
        query: printRequest(request),
        ...(request.operationName !== undefined && {
          operationName: request.operationName,
        }),
      });
      return decodeResponse(request, data);
    },
  };
}

export interface GraphQLRequestTransportOptions {
  /** Headers sent with every request */
  headers?: Record<string, string>;
}

/**
 * Transport backed by graphql-request's `GraphQLClient`
 */
export function graphqlRequestTransport(
  url: string,
  options: GraphQLRequestTransportOptions = {},
): Transport {
  const client = new GraphQLClient(url, {
    headers: options.headers ?? {},
  });
  return (operation) => client.request<unknown>(operation.query);
}
