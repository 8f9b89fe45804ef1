import { defineProject } from 'vitest/config'

export default defineProject({
	test: {
		name: 'polytope',
		include: ['test/**/*.spec.ts'],
		environment: 'node',
	},
})
