import {OrderedDict} from './OrderedDict'

export default OrderedDict
export {OrderedDict}
export {Position} from './Position'
export {DictError, KeyNotFoundError} from './exception'
export {defaultCompare} from './normalize'

export type {ValueRef} from './OrderedDict'
export type {Comparator, OrderedDictOptions} from './normalize'
