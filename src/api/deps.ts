import { CommandResolver } from '../commands';
import { DispatchDeps } from '../services/call-dispatcher';
import { CallLogStore } from '../store/call-log-store';

export interface AppDeps extends DispatchDeps {
  store: CallLogStore;
  resolvers: CommandResolver[];
  maxUploadBytes: number;
}
