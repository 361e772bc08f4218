export { CalculatorInput, calculator, calculatorDefinition } from './calculator'
export { WeatherInput, weather, weatherDefinition } from './weather'
export type { WeatherDependencies, WeatherTable } from './weather'
export {
    GetFileInfoInput,
    ListDirectoryInput,
    ReadFileInput,
    filesystemTools,
    getFileInfoDefinition,
    listDirectoryDefinition,
    readFileDefinition,
    resolveInRoot,
} from './filesystem'
export type { FilesystemDependencies } from './filesystem'
export { compareNames, formatListing, formatListingEntry } from './listing'
export type { ListingEntry } from './listing'
