export { renderFiles, renderUnit } from './structure.ts'
export { type RenderTokensOptions, renderTokens } from './tokens.ts'
