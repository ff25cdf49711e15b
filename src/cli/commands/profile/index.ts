export { listProfiles as list } from './list.js';
export { switchProfile } from './switch.js';
export { addProfile as add } from './add.js';
export { removeProfile as remove } from './remove.js';
export { showCurrent as current } from './current.js';
