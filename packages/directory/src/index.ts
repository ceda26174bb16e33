export { InMemoryNodeDirectory } from './node-directory.js';
export type { NodeDirectory, InMemoryNodeDirectoryEvents } from './node-directory.js';

export { NodeResolver, displayNameOf } from './node-resolver.js';
export type { ResolvedNode } from './node-resolver.js';
