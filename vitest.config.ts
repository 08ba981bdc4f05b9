import { puyaTsTransformer } from '@algorandfoundation/algorand-typescript-testing/vitest-transformer'
import typescript from '@rollup/plugin-typescript'
import { defineConfig } from 'vitest/config'

export default defineConfig({
  esbuild: {},
  test: {
    setupFiles: 'vitest.setup.ts',
    include: ['projects/**/*.spec.ts'],
    env: {
      LOG_LEVEL: 'silent',
    },
  },
  plugins: [
    typescript({
      tsconfig: './tsconfig.test.json',
      transformers: {
        before: [
          puyaTsTransformer({
            includeExt: [
              '.algo.ts',
              '/access/access-control.spec.ts',
              '/math/fixed-point.spec.ts',
              '/staking/accrual.spec.ts',
              '/staking/contract.spec.ts',
              '/swap/contract.spec.ts',
              '/swap/pricing.spec.ts',
              '/token/contract.spec.ts',
            ],
          }),
        ],
      },
    }),
  ],
})
