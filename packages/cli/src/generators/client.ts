import { DEFAULT_RUNTIME_MODULE } from "./selection";

export interface ClientGeneratorOptions {
  url: string;
  /** Module specifier the runtime is imported from */
  runtimeModule?: string;
}

/**
 * Generate the client file. Written once; users own it afterwards.
 */
export function generateClient(options: ClientGeneratorOptions): string {
  const { url, runtimeModule = DEFAULT_RUNTIME_MODULE } = options;

  return `/* eslint-disable */
/* qselect client - Generated once by qselect. Customize as needed. */

import { createClient, graphqlRequestTransport } from ${JSON.stringify(runtimeModule)}

const endpoint = ${JSON.stringify(url)}

/**
 * Sends requests built from ./schema and decodes their responses.
 * Customize the transport to add headers (e.g., auth tokens).
 */
export const client = createClient({
	transport: graphqlRequestTransport(endpoint, {
		headers: {
			// Add your headers here
		},
	}),
})
`;
}
