export { KeyedMutex, keyGenerationLock } from './mutex'
export {
  type GeneratedKeyPair,
  type KeyPairGenerator,
  KeyPairProvisioner,
  type KeyPairProvisionerOptions,
  generateRsaKeyPair,
} from './keypair'
