/**
 * Descriptor formatting. ISCC-NBS formatters use `{0}` for the colour name and
 * `{1}` for its "-ish" adjective, as in `{1} gray` → "reddish gray".
 */

const BASE_ISH: ReadonlyMap<string, string> = new Map([
	['brown', 'brownish'],
	['blue', 'bluish'],
	['red', 'reddish'],
	['green', 'greenish'],
	['yellow', 'yellowish'],
	['purple', 'purplish'],
	['pink', 'pinkish'],
	['orange', 'orangish'],
	['gray', 'grayish'],
	['grey', 'greyish'],
	['olive', 'olive'],
	['white', 'whitish'],
	['black', 'blackish'],
])

// Overlay names without an entry here keep their own form
const OVERLAY_ISH: ReadonlyMap<string, string> = new Map([
	['gold', 'goldish'],
	['peach', 'peachy'],
	['rose', 'rosy'],
	['rust', 'rusty'],
	['violet', 'violetish'],
	['sand', 'sandy'],
	['tan', 'tannish'],
])

/**
 * The "-ish" adjective of a colour name, or the name itself when it has none.
 */
export function ishForm(name: string): string {
	return BASE_ISH.get(name) ?? OVERLAY_ISH.get(name.toLowerCase()) ?? name
}

export function formatDescriptor(formatter: string, name: string): string {
	return formatter.replaceAll('{0}', name).replaceAll('{1}', ishForm(name))
}
