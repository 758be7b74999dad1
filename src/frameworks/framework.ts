import { DuplicateVersionError, UnknownVersionError } from '../errors.js';
import type {
  Deployable,
  DeployContext,
  DeployRequest,
  DeploymentSetting,
  FrameworkVersion,
} from './types.js';

export class Framework<V extends FrameworkVersion = FrameworkVersion> {
  private readonly versions = new Map<string, V>();

  constructor(
    readonly id: string,
    readonly displayName: string,
    private readonly deployer: Deployable<V>,
  ) {}

  get minimumMachines(): number {
    return this.deployer.minimumMachines;
  }

  addVersion(version: V): this {
    if (this.versions.has(version.version)) {
      throw new DuplicateVersionError(this.id, version.version);
    }
    this.versions.set(version.version, version);
    return this;
  }

  getVersion(version: string): V {
    const found = this.versions.get(version);
    if (!found) {
      throw new UnknownVersionError(this.id, version);
    }
    return found;
  }

  listVersions(): V[] {
    return Array.from(this.versions.values());
  }

  getSupportedDeploymentSettings(version: string): readonly DeploymentSetting[] {
    return this.deployer.supportedSettings(this.getVersion(version));
  }

  deploy(version: string, request: DeployRequest, context: DeployContext): Promise<void> {
    return this.deployer.deploy(this.getVersion(version), request, context);
  }
}
