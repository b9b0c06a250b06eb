import { buildNewApplication, CreateApplicationInput } from "../domain/application";
import { ConcurrentModificationError, NotFoundError } from "../domain/errors";
import { Application } from "../domain/model";
import { ApplicationRepository } from "./applicationRepository";

export class InMemoryApplicationRepository implements ApplicationRepository {
  private readonly store = new Map<number, Application>();
  private nextId: number;

  constructor(options: { firstId?: number } = {}) {
    this.nextId = options.firstId ?? 1;
  }

  async create(input: CreateApplicationInput): Promise<Application> {
    const application = buildNewApplication(this.nextId, input, new Date().toISOString());
    this.nextId += 1;

    this.store.set(application.id, structuredClone(application));
    return application;
  }

  async findById(id: number): Promise<Application | undefined> {
    const application = this.store.get(id);
    return application ? structuredClone(application) : undefined;
  }

  async save(application: Application, expectedVersion: number): Promise<Application> {
    const current = this.store.get(application.id);
    if (!current) {
      throw new NotFoundError(`Application ${application.id} was not found.`);
    }

    if (current.version !== expectedVersion) {
      throw new ConcurrentModificationError(application.id);
    }

    const stored: Application = {
      ...structuredClone(application),
      version: expectedVersion + 1,
      updatedAt: new Date().toISOString()
    };
    this.store.set(stored.id, stored);

    return structuredClone(stored);
  }

  async delete(id: number): Promise<boolean> {
    return this.store.delete(id);
  }
}
