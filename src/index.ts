// Public library surface.

export const VERSION = '0.1.0';

export * from './argumentParser';
export * from './parserConfig';
export * from './errors';
export * from './notifier';

export * from './values/valueTypes';
export * from './values/value';
export * from './values/environment';

export * from './definition/command';
export * from './definition/group';
export * from './definition/option';
export * from './definition/optionConfig';
export * from './definition/parserDefinition';

export * from './parse/parseResult';

export * from './help/describe';
export * from './help/errorMessages';
export * from './help/helpFormatter';

export * from './report/parseReport';
export * from './report/markdownReport';
export * from './report/writeReport';
export * from './report/stableJson';

export * from './schema/definitionFile';
