export {
  type SshChannelConfig,
  type SshClientFactory,
  SshCommandChannel,
  SshConnectionError,
} from './ssh-channel'
