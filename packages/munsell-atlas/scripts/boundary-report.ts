/**
 * Sweep the hue circle and count where Method1 and Method2 name a colour differently.
 */

import { getIsccNbsClassifier } from '../src/iscc-nbs.ts'
import { colorFromHuePosition, formatMunsell } from '../src/munsell.ts'

const classifier = getIsccNbsClassifier()

const VALUES = [1, 2, 3, 4, 5, 6, 7, 8, 9]
const CHROMAS = [1, 2, 4, 6, 8, 10, 12, 14, 16]

let total = 0
let disagreements = 0
let nearest = 0
const examples: string[] = []

for (let hue = 0; hue < 100; hue++) {
	for (const value of VALUES) {
		for (const chroma of CHROMAS) {
			const color = colorFromHuePosition(hue, value, chroma)
			const first = classifier.classify(color, 'Method1')
			const second = classifier.classify(color, 'Method2')
			total++

			if (first.match === 'nearest' || second.match === 'nearest') {
				nearest++
			}
			if (first.color.number !== second.color.number) {
				disagreements++
				if (examples.length < 20) {
					examples.push(
						`${formatMunsell(color).padEnd(16)} Method1: ${first.color.descriptor.padEnd(28)} Method2: ${second.color.descriptor}`,
					)
				}
			}
		}
	}
}

console.log(`Sampled ${total} colours on integer hues`)
console.log(`Policies disagree on ${disagreements} (${((disagreements / total) * 100).toFixed(1)}%)`)
console.log(`Nearest-region fallback used for ${nearest}`)
console.log('')
for (const line of examples) {
	console.log(line)
}
