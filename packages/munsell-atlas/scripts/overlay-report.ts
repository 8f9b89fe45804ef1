/**
 * Summarise the bundled overlays: hull size, centroid notation and overlaps.
 *
 * Run after editing data/overlay-samples.json to see how the peel shaped each cloud.
 */

import { fromCartesian } from '../src/cartesian.ts'
import { getIsccNbsClassifier } from '../src/iscc-nbs.ts'
import { formatMunsell } from '../src/munsell.ts'
import { formatDescriptor } from '../src/naming.ts'
import { getOverlayIndex } from '../src/overlays.ts'

const index = getOverlayIndex()
const classifier = getIsccNbsClassifier()

console.log('Overlay      Vertices  Faces  Centroid            ISCC-NBS at centroid          Overlaps')
console.log('-'.repeat(100))

for (const name of index.names) {
	const overlay = index.get(name)
	if (overlay === undefined) {
		continue
	}

	const centroid = fromCartesian(overlay.centroid)
	const { color } = classifier.classify(centroid, 'Method2')
	const overlaps = [...index.matchingOverlays(overlay.centroid)].filter((other) => other !== name)

	console.log(
		[
			name.padEnd(12),
			String(overlay.polyhedron.vertices.length).padStart(8),
			String(overlay.polyhedron.faces.length).padStart(6),
			'  ' + formatMunsell(centroid).padEnd(18),
			formatDescriptor(color.formatter, name).padEnd(30),
			overlaps.join(', ') || '-',
		].join(' '),
	)
}
