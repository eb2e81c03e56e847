/**
 * govex DTO package public surface.
 * Re-exports stable enums, reason codes and wire types.
 */
export * from './enums';
export * from './reasons';
export * from './exchange';
