// ================================== FORMAT ==================================

export function humanReadableDate(date: Date): string {
	return date.toLocaleString("sv", { timeZone: "UTC" });
}

export function humanReadableSize(
	bytes: bigint | number,
	options?: { binary: boolean },
) {
	const n = Number(bytes);
	if (n === 0) return "0 B";
	const k = options?.binary ? 1024 : 1000;
	const sizes = options?.binary
		? ["B", "KiB", "MiB", "GiB", "TiB", "PiB", "EiB"]
		: ["B", "kB", "MB", "GB", "TB", "PB", "EB"];
	// engineering notation: (coefficient) * 1000 ^ (exponent)
	const exponent = Math.min(
		Math.floor(Math.log(Math.abs(n)) / Math.log(k)),
		sizes.length - 1,
	);
	const coefficient = n / Math.pow(k, exponent);
	return `${parseFloat(coefficient.toFixed(2))} ${sizes[exponent]}`;
}

// =================================== URLS ===================================

export function sanitizeUrl(url: string | URL): string {
	if (typeof url === "string") {
		url = new URL(url);
	}
	return url.origin + url.pathname;
}

// ================================== MISC ==================================

export function fallback<T>(...args: (T | undefined)[]): T | undefined {
	for (const arg of args) {
		if (arg !== undefined) return arg;
	}
	return undefined;
}

export function getErrorMessage(e: unknown): string {
	return e instanceof Error ? e.message : String(e);
}
