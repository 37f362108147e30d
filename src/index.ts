export { parse, DEFAULT_MAX_DEPTH } from './parser.js';
export { unescapeString } from './core/string.js';
export { Value, type ValueData, type ValueKind, type ValueInput } from './value/value.js';
export {
    OrderedValueMap,
    HashedValueMap,
    createValueMap,
    type ValueMap,
    type ReadonlyValueMap,
} from './value/map.js';
export {
    INT64_MIN,
    INT64_MAX,
    intNumber,
    floatNumber,
    toJsNumber,
    type JsonNumber,
} from './value/number.js';
export {
    ParseError,
    ValueTypeError,
    ConfigError,
    type ParseErrorDetail,
    type ParseErrorKind,
} from './errors.js';
export { configure, getConfig, loadConfig, OBJECT_BACKING_ENV } from './config.js';
export {
    type ObjectBacking,
    type JsonwoodConfig,
    type ParseOptions,
    type IndexOrKey,
} from './types.js';
