/**
 * ENDPOINT UTILITIES - Manager URL Handling
 * =========================================
 *
 * Normalizes the manager URL from the inventory and builds REST paths.
 * Inventories give the manager either as a bare host ("10.0.0.10") or as a
 * full URL, with or without a port.
 *
 * Usage:
 * ```typescript
 * const baseURL = buildBaseUrl('10.0.0.10', 8443);
 * // => 'https://10.0.0.10:8443'
 * const path = buildDataservicePath('/system/device/vedges');
 * // => '/dataservice/system/device/vedges'
 * ```
 */

/**
 * Add https:// when no scheme is given and strip trailing slashes
 *
 * @example
 * normalizeManagerUrl('10.0.0.10/')
 * // => 'https://10.0.0.10'
 */
export function normalizeManagerUrl(url: string): string {
	const trimmed = url.trim().replace(/\/+$/, '');
	return /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
}

/**
 * Combine URL and port into the axios baseURL.
 * A port already present in the URL wins over the separate port setting.
 *
 * @example
 * buildBaseUrl('https://manager.example.com', 8443)
 * // => 'https://manager.example.com:8443'
 */
export function buildBaseUrl(url: string, port: number): string {
	const parsed = new URL(normalizeManagerUrl(url));
	if (!parsed.port) {
		parsed.port = String(port);
	}
	// URL keeps a trailing slash on the bare origin; axios joins paths itself
	return parsed.toString().replace(/\/+$/, '');
}

/**
 * Build a path under the manager's dataservice API
 *
 * @example
 * buildDataservicePath('v1/config-group')
 * // => '/dataservice/v1/config-group'
 */
export function buildDataservicePath(path: string): string {
	const normalizedPath = path.startsWith('/') ? path : `/${path}`;
	return `/dataservice${normalizedPath}`;
}
