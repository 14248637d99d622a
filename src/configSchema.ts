import ms from "ms";
import { z } from "zod";
import { DEFAULT_BASE_URL, USER_AGENT } from "./constants.js";
import { formatIssues } from "./decode.js";
import { ConfigError } from "./errors.js";

/**
 * error messages returned upon Zod validation failure
 */
enum zodErrorMsg {
	vercel = "format does not follow vercel's `ms` style ( https://github.com/vercel/ms#examples )",
	emptyString = "cannot have an empty string",
	timeout = "timeout must be a positive duration",
	fetch = "fetch must be a function",
}

const FETCH_SCHEMA = z.custom<typeof fetch>(
	(value) => typeof value === "function",
	{ message: zodErrorMsg.fetch },
);

export const CLIENT_CONFIG_SCHEMA = z.object({
	baseUrl: z
		.string()
		.url()
		.transform((url) => url.replace(/\/+$/, ""))
		.default(DEFAULT_BASE_URL),
	timeout: z
		.union([
			z.number(),
			z
				.string()
				.min(1, { message: zodErrorMsg.emptyString })
				.transform((time, ctx) => {
					const vercel = ms(time);
					if (isNaN(vercel)) {
						ctx.addIssue({
							code: z.ZodIssueCode.custom,
							message: zodErrorMsg.vercel,
						});
						return z.NEVER;
					}
					return vercel;
				}),
		])
		.pipe(z.number().positive({ message: zodErrorMsg.timeout }))
		.optional(),
	userAgent: z
		.string()
		.min(1, { message: zodErrorMsg.emptyString })
		.default(USER_AGENT),
	fetch: FETCH_SCHEMA.optional(),
});

export type ClientOptions = z.input<typeof CLIENT_CONFIG_SCHEMA>;
export type ClientConfig = z.output<typeof CLIENT_CONFIG_SCHEMA>;

export function parseClientConfig(options: ClientOptions = {}): ClientConfig {
	const result = CLIENT_CONFIG_SCHEMA.safeParse(options);
	if (!result.success) {
		throw new ConfigError(
			`Your configuration is invalid: ${formatIssues(result.error)}`,
		);
	}
	return result.data;
}
