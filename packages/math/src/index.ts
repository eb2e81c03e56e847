/**
 * govex math public surface. Pure, side-effect free helpers.
 */
export * from './sqrt'
export * from './curve'
