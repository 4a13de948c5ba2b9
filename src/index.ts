#!/usr/bin/env node
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { loadAppConfig, resolveFinanceConfig } from "./config";
import {
  calculateBondAmount,
  calculateMonthlyCosts,
  calculateOnceOffCosts,
  extractNumericValue,
} from "./finance";
import { formatCurrency, generateNote } from "./note";
import { Property24Scraper } from "./scraper";
import type { FinanceConfig } from "./types";
import { listNotes, saveNote } from "./vault";

async function main(): Promise<void> {
  const appConfig = loadAppConfig();

  await yargs(hideBin(process.argv))
    .scriptName("prop24-vault")
    .option("config", {
      alias: "c",
      describe: "Finance config JSON file (brackets, rate, term, line items)",
      type: "string",
      default: appConfig.financeConfigPath,
    })
    .command(
      "note <url>",
      "Scrape a Property24 listing and save it as a vault note",
      (yargs_) => {
        return yargs_
          .positional("url", {
            describe: "Property24 listing URL",
            type: "string",
            demandOption: true,
          })
          .option("vault", {
            describe: "Vault folder the note is written under",
            type: "string",
            default: appConfig.vaultPath,
          })
          .option("rate", {
            describe: "Annual bond interest rate in percent",
            type: "number",
          })
          .option("years", {
            describe: "Bond term in years",
            type: "number",
          })
          .option("timeout", {
            alias: "t",
            describe: "Page load timeout in milliseconds",
            type: "number",
            default: appConfig.scraperTimeout,
          })
          .option("dry-run", {
            describe: "Print the note instead of writing it",
            type: "boolean",
            default: false,
          });
      },
      async (args) => {
        await createNote(args.url, {
          vaultPath: args.vault,
          timeout: args.timeout,
          userAgent: appConfig.userAgent,
          dryRun: args["dry-run"],
          finance: resolveFinanceConfig({
            configFile: args.config,
            rate: args.rate,
            years: args.years,
          }),
        });
      }
    )
    .command(
      "costs <price>",
      "Estimate once-off and monthly costs for a purchase price",
      (yargs_) => {
        return yargs_
          .positional("price", {
            describe: 'Purchase price, e.g. 1500000 or "R 1 500 000"',
            type: "string",
            demandOption: true,
          })
          .option("levies", {
            describe: "Monthly levies",
            type: "string",
            default: "0",
          })
          .option("rates", {
            describe: "Monthly rates and taxes",
            type: "string",
            default: "0",
          })
          .option("rate", {
            describe: "Annual bond interest rate in percent",
            type: "number",
          })
          .option("years", {
            describe: "Bond term in years",
            type: "number",
          });
      },
      (args) => {
        printCosts(
          args.price,
          args.levies,
          args.rates,
          resolveFinanceConfig({
            configFile: args.config,
            rate: args.rate,
            years: args.years,
          })
        );
      }
    )
    .command(
      "list [province] [city] [suburb]",
      "List notes saved in the vault",
      (yargs_) => {
        return yargs_
          .positional("province", { type: "string" })
          .positional("city", { type: "string" })
          .positional("suburb", { type: "string" })
          .option("vault", {
            describe: "Vault folder",
            type: "string",
            default: appConfig.vaultPath,
          });
      },
      async (args) => {
        await listVault(args.vault, {
          province: args.province,
          city: args.city,
          suburb: args.suburb,
        });
      }
    )
    .help()
    .alias("h", "help")
    .version()
    .alias("v", "version")
    .demandCommand(1, "Please provide a command")
    .strict()
    .parseAsync();
}

async function createNote(
  url: string,
  options: {
    vaultPath: string;
    timeout: number;
    userAgent: string;
    dryRun: boolean;
    finance: FinanceConfig;
  }
): Promise<void> {
  try {
    console.log("\n📦 Property24 Vault Notes");
    console.log("=".repeat(50));

    const scraper = new Property24Scraper({
      timeout: options.timeout,
      userAgent: options.userAgent,
    });
    const result = await scraper.scrapeListing(url);

    if (!result.success || !result.property) {
      throw new Error(result.message);
    }

    const note = generateNote(result.property, { config: options.finance });
    const { province, city, suburb } = note.location;
    console.log(`📍 ${province} / ${city} / ${suburb}`);

    if (options.dryRun) {
      console.log(`\n📄 ${note.filename}\n`);
      console.log(note.content);
      return;
    }

    await saveNote(note, options.vaultPath);

    console.log("\n✅ Note created");
    console.log("=".repeat(50));
    console.log(`   Price: ${formatCurrency(note.metadata.price)}`);
    console.log(
      `   Monthly cost: ${formatCurrency(note.metadata.monthly_cost)}`
    );
  } catch (error) {
    console.error(
      "\n❌ Fatal error:",
      error instanceof Error ? error.message : String(error)
    );
    process.exit(1);
  }
}

function printCosts(
  priceText: string,
  levies: string,
  rates: string,
  finance: FinanceConfig
): void {
  const price = extractNumericValue(priceText);
  if (price <= 0) {
    console.warn(`⚠️  Could not read a price from "${priceText}"`);
  }

  const onceOff = calculateOnceOffCosts(price, finance);
  const monthly = calculateMonthlyCosts(
    {
      bondAmount: calculateBondAmount(price),
      levies,
      ratesTaxes: rates,
      price,
    },
    finance
  );

  console.log(`\n💰 Costs for ${formatCurrency(price)}`);
  console.log("=".repeat(50));
  console.log("Once-off:");
  console.log(`   Deposit:           ${formatCurrency(onceOff.deposit)}`);
  console.log(`   Transfer duty:     ${formatCurrency(onceOff.transferDuty)}`);
  console.log(
    `   Bond registration: ${formatCurrency(onceOff.bondRegistration)}`
  );
  console.log(`   Transfer costs:    ${formatCurrency(onceOff.transferCosts)}`);
  console.log(`   Attorney fees:     ${formatCurrency(onceOff.attorneyFees)}`);
  console.log(
    `   Bond origination:  ${formatCurrency(onceOff.bondOrigination)}`
  );
  console.log(`   Moving costs:      ${formatCurrency(onceOff.movingCosts)}`);
  console.log(`   Security setup:    ${formatCurrency(onceOff.securitySetup)}`);
  console.log(
    `   Immediate repairs: ${formatCurrency(onceOff.immediateRepairs)}`
  );
  console.log(`   Total:             ${formatCurrency(onceOff.total)}`);
  console.log(`   Incl. price:       ${formatCurrency(onceOff.grandTotal)}`);
  console.log("\nMonthly:");
  console.log(`   Bond payment:      ${formatCurrency(monthly.bondPayment)}`);
  console.log(`   Levies:            ${formatCurrency(monthly.levies)}`);
  console.log(`   Rates & taxes:     ${formatCurrency(monthly.ratesTaxes)}`);
  console.log(`   Insurance:         ${formatCurrency(monthly.insurance)}`);
  console.log(`   Maintenance:       ${formatCurrency(monthly.maintenance)}`);
  console.log(`   Utilities:         ${formatCurrency(monthly.utilities)}`);
  console.log(`   Security:          ${formatCurrency(monthly.security)}`);
  console.log(`   Total:             ${formatCurrency(monthly.total)}`);
}

async function listVault(
  vaultPath: string,
  location: { province?: string; city?: string; suburb?: string }
): Promise<void> {
  try {
    const notes = await listNotes(vaultPath, location);

    if (notes.length === 0) {
      console.log(`\nNo notes found in ${vaultPath}`);
      return;
    }

    console.log(`\n📍 Notes in ${vaultPath} (${notes.length} total):`);
    console.log("=".repeat(50));
    notes.forEach((note, index) => {
      console.log(`${index + 1}. ${note}`);
    });
  } catch (error) {
    console.error(
      "\n❌ Fatal error:",
      error instanceof Error ? error.message : String(error)
    );
    process.exit(1);
  }
}

main().catch((error) => {
  console.error("❌ Unhandled error:", error);
  process.exit(1);
});
