import fs from "fs";
import path from "path";
import { parse } from "csv-parse";
import { type Address, getAddress, isAddress, parseUnits } from "viem";
import { DECIMALS } from "../constants/contracts";

export interface Allocation {
  address: Address;
  amount: bigint;
}

interface AllocationRow {
  Address: string;
  "Total Amount": string;
}

const toAllocation = (record: AllocationRow): Allocation => {
  const address = record["Address"];
  if (!isAddress(address)) {
    throw new Error(`Invalid Address format: ${address}`);
  }

  const amount = parseUnits(record["Total Amount"].replace(",", "."), Number(DECIMALS));
  if (amount <= 0n) {
    throw new Error(`Invalid Total Amount for ${address}: ${record["Total Amount"]}`);
  }

  return { address: getAddress(address), amount };
};

/**
 * Reads the genesis distribution, a `;`-separated CSV with `Address` and
 * `Total Amount` columns. Amounts are in whole tokens and may use a decimal
 * comma.
 */
export const parseCSVToAllocationArray = (filePath: string): Promise<Allocation[]> => {
  return new Promise((resolve, reject) => {
    const allocations: Allocation[] = [];
    const parser = parse({
      delimiter: ";",
      columns: true,
      skip_empty_lines: true,
      trim: true,
    });

    parser.on("readable", function () {
      let record: AllocationRow | null;
      while ((record = parser.read()) !== null) {
        try {
          allocations.push(toAllocation(record));
        } catch (error) {
          parser.destroy(error instanceof Error ? error : new Error(String(error)));
          return;
        }
      }
    });

    parser.on("error", function (err) {
      reject(err);
    });

    parser.on("end", function () {
      resolve(allocations);
    });

    fs.createReadStream(path.resolve(filePath)).pipe(parser);
  });
};

export const totalAllocated = (allocations: Allocation[]) =>
  allocations.reduce((sum, allocation) => sum + allocation.amount, 0n);
