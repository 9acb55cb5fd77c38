import { logger } from "../config/logger.js";
import { getContractsDir } from "../config/paths.js";
import { ContractValidator } from "../contracts/contractValidator.js";
import { describeError } from "../shared/errors.js";

const dir = process.argv[2] ?? getContractsDir();

try {
  const validator = ContractValidator.fromDirectory(dir);
  const contracts = validator.listContracts();

  for (const contract of contracts) {
    logger.info({ contract: contract.name, current: contract.current, versions: contract.versions }, "Contract loaded");
  }
  logger.info({ dir, contracts: contracts.length }, "All contract schemas are valid");
} catch (error) {
  logger.error({ dir, error: describeError(error) }, "Contract schemas failed to load");
  process.exitCode = 1;
}
