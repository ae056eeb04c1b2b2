export { Chunkwise, type ChunkwiseOptions } from './chunkwise.js';
export { ParseError } from './errors.js';
export { run, parse, feed, finish, parseOnly, parseIterable, parseAsync } from './parse.js';
export { Tape } from './core/tape.js';
export { done, bounce, suspend, settle } from './core/trampoline.js';
export { awaitPrompt, pullFrom, createState, mergeStreams } from './core/state.js';
export { pure, fail, get, put, demandInput, wantInput, ensure, total } from './core/primitives.js';
export { satisfy, skip, anyToken, takeWith, take } from './core/token.js';
export { skipWhile, takeWhile, takeTill, takeWhile1, takeRest, endOfInput, atEnd } from './core/scan.js';
export {
    bind,
    map,
    then,
    thenLeft,
    between,
    alt,
    choice,
    option,
    optional,
    lookAhead,
    label,
    many,
    many1,
    skipMany,
    skipMany1,
    sepBy,
    sepBy1,
    manyTill,
    count,
} from './core/combinators.js';
export * as chars from './text.js';
export {
    NEVER_FAILS,
    type Chunk,
    type More,
    type InputState,
    type Thunk,
    type Resume,
    type Step,
    type Settled,
    type OnFailure,
    type OnSuccess,
    type Prompt,
    type Parser,
    type TotalParser,
    type FallibleParser,
    type Done,
    type Fail,
    type Suspended,
    type Final,
    type Result,
    type ParseOptions,
} from './types.js';
