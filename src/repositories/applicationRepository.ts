import { CreateApplicationInput } from "../domain/application";
import { Application } from "../domain/model";

export interface ApplicationRepository {
  init?(): Promise<void>;
  create(input: CreateApplicationInput): Promise<Application>;
  findById(id: number): Promise<Application | undefined>;
  /**
   * Compare-and-swap write: fails with ConcurrentModificationError when the stored
   * version is no longer `expectedVersion`. Resolves with the stored copy.
   */
  save(application: Application, expectedVersion: number): Promise<Application>;
  delete(id: number): Promise<boolean>;
}
