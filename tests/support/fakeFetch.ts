export type FakeReply = { status?: number; body: unknown } | Error;

export type RecordedRequest = {
	url: URL;
	init?: RequestInit;
};

/**
 * A fetch that never leaves the process: every request is recorded and
 * answered by `reply`. Non-string bodies are sent as JSON.
 */
export function createFakeFetch(reply: (url: URL) => FakeReply): {
	fetch: typeof fetch;
	requests: RecordedRequest[];
} {
	const requests: RecordedRequest[] = [];

	const fakeFetch: typeof fetch = async (input, init) => {
		const url = new URL(input instanceof Request ? input.url : input);
		requests.push({ url, init });
		const answer = reply(url);
		if (answer instanceof Error) {
			throw answer;
		}
		const body =
			typeof answer.body === "string"
				? answer.body
				: JSON.stringify(answer.body);
		return new Response(body, {
			status: answer.status ?? 200,
			headers: { "content-type": "application/json" },
		});
	};

	return { fetch: fakeFetch, requests };
}
