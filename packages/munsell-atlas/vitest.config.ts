import { defineProject } from 'vitest/config'

export default defineProject({
	test: {
		name: 'munsell-atlas',
		include: ['test/**/*.spec.ts'],
		environment: 'node',
	},
})
