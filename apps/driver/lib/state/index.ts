export { StateStore, type StateStoreOptions, holdsRemoteResources } from './store'
