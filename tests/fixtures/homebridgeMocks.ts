import { vi } from 'vitest'
import type { Logger } from 'homebridge'
import Axios, { type AxiosInstance } from 'axios'

export function createMockLogger() {
	return {
		prefix: 'AcInfinity',
		debug: vi.fn(),
		info: vi.fn(),
		success: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		log: vi.fn(),
	} satisfies Logger
}

export function createMockApi() {
	return {
		on: vi.fn(),
		registerPlatform: vi.fn(),
	}
}

export interface StubResponse {
	status: number
	data: unknown
}

export type RouteHandler = (form: URLSearchParams) => StubResponse

/**
 * Replaces `Axios.create` with an instance whose `post` dispatches on the endpoint path.
 * Call before constructing the client.
 */
export function stubAxios(routes: Record<string, RouteHandler> = {}) {
	const post = vi.fn(async (url: string, body: string, _config?: unknown): Promise<StubResponse> => {
		const handler = routes[url]
		if (!handler) {
			throw new Error(`No stub for ${url}`)
		}
		return handler(new URLSearchParams(body))
	})
	vi.spyOn(Axios, 'create').mockReturnValue({ post } as unknown as AxiosInstance)
	return { post, routes }
}

export function ok(data: unknown = null): StubResponse {
	return { status: 200, data: { code: 200, msg: 'success', data } }
}

export function failure(code: number, msg = 'failure'): StubResponse {
	return { status: 200, data: { code, msg, data: null } }
}

/**
 * Form bodies posted to `path`, parsed.
 */
export function postedForms(post: { mock: { calls: unknown[][] } }, path: string): URLSearchParams[] {
	return post.mock.calls
		.filter(call => call[0] === path)
		.map(call => new URLSearchParams(String(call[1])))
}
