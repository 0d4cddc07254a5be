export * from './fakes';
export * from './inMemoryStores';
export * from './testApp';
