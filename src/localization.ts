import * as fs from 'fs';
import * as path from 'path';
import * as l10n from '@vscode/l10n';

/** Directory holding `bundle.l10n*.json`, next to `src/` and `dist/`. */
export const L10N_DIR = path.resolve(__dirname, '..', 'l10n');

/**
 * Resolves the bundle for a locale, falling back from `zh-cn` to `zh` and finally to the
 * English default bundle.
 *
 * @param locale - Lower-case BCP 47 tag such as `en` or `zh-cn`.
 * @param directory - Directory to look in.
 */
export function resolveBundlePath(locale: string, directory: string = L10N_DIR): string {
	const candidates = [locale, locale.split('-')[0]]
		.filter((candidate) => candidate && candidate !== 'en')
		.map((candidate) => path.join(directory, `bundle.l10n.${candidate}.json`));
	const match = candidates.find((candidate) => fs.existsSync(candidate));
	return match ?? path.join(directory, 'bundle.l10n.json');
}

/**
 * Loads the string bundle used by every `l10n.t` call in the process.
 *
 * @param locale - Locale requested through configuration.
 * @returns Path of the bundle that was loaded.
 */
export async function loadLocalization(locale: string): Promise<string> {
	const bundlePath = resolveBundlePath(locale);
	await l10n.config({ fsPath: bundlePath });
	return bundlePath;
}
