import fs from "fs-extra";
import { NotFoundError, ValidationError } from "@etlctl/adapters-common";
import type { ITerraformCli } from "../terraform/terraform-cli";
import { parseTerraformOutputs } from "./infrastructure-outputs";
import type { InfrastructureOutputs, IOutputResolver } from "./infrastructure-outputs";

/** Reads outputs by running `terraform output -json`. */
export class TerraformOutputResolver implements IOutputResolver {
  constructor(private readonly terraform: ITerraformCli) {}

  async resolve(): Promise<InfrastructureOutputs> {
    return parseTerraformOutputs(await this.terraform.outputJson());
  }
}

/** Reads outputs from a saved `terraform output -json` file. */
export class FileOutputResolver implements IOutputResolver {
  constructor(private readonly filePath: string) {}

  async resolve(): Promise<InfrastructureOutputs> {
    if (!(await fs.pathExists(this.filePath))) {
      throw new NotFoundError(`Outputs file ${this.filePath} does not exist`);
    }

    let json: unknown;
    try {
      json = await fs.readJson(this.filePath);
    } catch (error) {
      throw new ValidationError(`Outputs file ${this.filePath} is not valid JSON`, { cause: error });
    }
    return parseTerraformOutputs(json);
  }
}
