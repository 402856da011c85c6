export type { ScopeDirectoryClient } from "./types.js";
export { AzureScopeDirectory, createAzureScopeDirectory } from "./azure-directory.js";
export type { AzureScopeDirectoryOptions } from "./azure-directory.js";
export { FakeScopeDirectory } from "./fake-directory.js";
export type { FakeScope, FakeScopeDirectoryData } from "./fake-directory.js";
