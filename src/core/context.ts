/**
 * Per-run dependencies handed to the fetcher, resolver and scheduler.
 * Nothing here is module-global: two runs never share a discovery cache.
 */

import type { Config } from "../config.js"
import { createHttpContext, type HttpContext, type HttpContextOptions } from "../http.js"
import { CdnDiscoveryCache } from "./resolver/cdn.js"

export interface RunContext {
	http: HttpContext
	cdn: CdnDiscoveryCache
	apiUrl: string
	extraCdnHosts: string[]
}

export function createRunContext(
	config: Config,
	http: HttpContextOptions = {},
): RunContext {
	return {
		http: createHttpContext({
			retry: {
				maxAttempts: config.retryAttempts,
				baseDelayMs: config.retryBaseDelayMs,
			},
			timeouts: {
				connectMs: config.connectTimeoutMs,
				readMs: config.readTimeoutMs,
			},
			...http,
		}),
		cdn: new CdnDiscoveryCache(config.cdnHostsFile),
		apiUrl: config.apiUrl,
		extraCdnHosts: config.extraCdnHosts,
	}
}
