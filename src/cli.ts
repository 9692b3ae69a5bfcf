#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import ora, { Ora } from 'ora';
import { readFileSync } from 'fs';
import { join } from 'path';
import { createConfigStore, initializeConfig, resolveConfigPath, validateAndNormalizeConfig } from './config';
import { errorMessage, isProvisioningError } from './errors';
import { DEFAULT_FUNCTION_PACKAGE } from './provisioning';
import {
  createDeploymentOrchestrator,
  DeploymentOrchestrator,
  DeploymentResult,
  resumePoint,
  StateChangeListener,
  STEP_OUTPUT_FIELD
} from './orchestration';
import { DEPLOYMENT_STEPS, DeploymentConfig, Logger, ResourceKind } from './types';

interface ConfigOption {
  config: string;
}

interface InitCommandOptions extends ConfigOption {
  stack?: string;
  region?: string;
  profile?: string;
  package?: string;
  roleArn?: string;
}

interface DeployCommandOptions extends ConfigOption {
  from?: ResourceKind;
  dryRun?: boolean;
  verbose?: boolean;
}

const STEP_COMMANDS: Record<ResourceKind, { name: string; description: string }> = {
  storage: { name: 'create-storage', description: 'Create the storage bucket' },
  table: { name: 'create-table', description: 'Create the database table' },
  function: { name: 'create-function', description: 'Upload the function package and create or update the function' },
  api: { name: 'create-api', description: 'Create the HTTP API and route it to the function' }
};

function readVersion(): string {
  const parsed: unknown = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf8'));
  if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
    return parsed.version;
  }
  return '0.0.0';
}

function parseStep(value: string): ResourceKind {
  const step = DEPLOYMENT_STEPS.find(candidate => candidate === value);
  if (!step) {
    throw new InvalidArgumentError(`Step must be one of: ${DEPLOYMENT_STEPS.join(', ')}`);
  }
  return step;
}

// Provisioner output goes around the spinner so the two don't interleave
function spinnerLogger(spinner: Ora): Logger {
  return {
    log: (...args: unknown[]) => {
      spinner.clear();
      console.log(chalk.gray(args.join(' ')));
      spinner.render();
    },
    warn: (...args: unknown[]) => {
      spinner.clear();
      console.warn(chalk.yellow(args.join(' ')));
      spinner.render();
    }
  };
}

function spinnerListener(spinner: Ora): StateChangeListener {
  return state => {
    switch (state.status) {
      case 'running':
        spinner.text = `Provisioning ${state.step}...`;
        break;
      case 'pending':
        spinner.text = `Next step: ${state.step}`;
        break;
      case 'step_failed':
        spinner.text = `Step ${state.step} failed`;
        break;
      case 'completed':
        spinner.text = 'All steps completed';
        break;
    }
  };
}

function reportResult(result: DeploymentResult, spinner: Ora): void {
  if (result.success) {
    spinner.succeed(
      result.state.status === 'completed'
        ? 'Deployment completed successfully!'
        : `Step completed, next step: ${result.state.status === 'pending' ? result.state.step : 'none'}`
    );

    for (const provisioned of result.results) {
      const marker = provisioned.alreadyExisted ? chalk.gray('existing') : chalk.green('created');
      console.log(`  ${provisioned.resourceKind}: ${provisioned.identifier} (${marker})`);
    }

    if (result.endpoints.length > 0) {
      console.log(chalk.blue('\n🌐 Endpoints:'));
      result.endpoints.forEach(endpoint => {
        console.log(`  ${endpoint.type}: ${chalk.underline(endpoint.url)}`);
        console.log(`    ${endpoint.description}`);
      });
    }

    console.log(chalk.gray(`\n⏱️  Took ${result.metadata.duration}ms`));
    console.log(chalk.gray(`🆔 Deployment ID: ${result.metadata.deploymentId}`));
    return;
  }

  const failure = result.failure;
  spinner.fail(failure ? `Step "${failure.step}" failed` : 'Deployment failed');
  if (failure) {
    console.log(chalk.red(`\n❌ ${failure.error.code}: ${failure.error.message}`));
    if (failure.error.remediation) {
      console.log(chalk.yellow(`  💡 ${failure.error.remediation}`));
    }

    const persisted = Object.entries(failure.persisted);
    if (persisted.length > 0) {
      console.log(chalk.blue('\nAlready provisioned:'));
      persisted.forEach(([field, value]) => console.log(`  ${field}: ${value}`));
    }
  }
  process.exit(1);
}

function reportError(spinner: Ora, title: string, error: unknown, verbose = false): never {
  spinner.fail(title);
  console.error(chalk.red('❌ Error:'), errorMessage(error));
  if (isProvisioningError(error) && error.remediation) {
    console.error(chalk.yellow(`💡 ${error.remediation}`));
  }
  if (verbose) {
    console.error(error);
  }
  process.exit(1);
}

async function runOrchestrated(
  options: ConfigOption & { dryRun?: boolean; verbose?: boolean },
  startText: string,
  run: (orchestrator: DeploymentOrchestrator, config: DeploymentConfig) => Promise<DeploymentResult>
): Promise<void> {
  const spinner = ora(startText).start();

  try {
    const store = createConfigStore(options.config);
    const config = await store.load();

    const orchestrator = createDeploymentOrchestrator(config, store, {
      dryRun: options.dryRun,
      logger: spinnerLogger(spinner),
      onStateChange: spinnerListener(spinner)
    });

    reportResult(await run(orchestrator, config), spinner);
    if (options.dryRun) {
      console.log(chalk.yellow('\n⚠️  Dry run: no AWS resources were created and the config was not saved'));
    }
  } catch (error) {
    reportError(spinner, 'Deployment failed', error, options.verbose);
  }
}

const program = new Command();

program
  .name('hackstack')
  .description('Provision a serverless stack (bucket, table, function, API) on AWS')
  .version(readVersion());

program
  .command('init')
  .description('Create the configuration file, or fill the missing fields of an existing one')
  .option('-c, --config <path>', 'Path to configuration file', resolveConfigPath())
  .option('-s, --stack <name>', 'Stack name')
  .option('-r, --region <region>', 'AWS region')
  .option('-p, --profile <profile>', 'AWS credentials profile')
  .option('--package <zip>', 'Path to the packaged function')
  .option('--role-arn <arn>', 'Existing execution role for the function')
  .action(async (options: InitCommandOptions) => {
    const spinner = ora('Initializing configuration...').start();

    try {
      const store = createConfigStore(options.config);
      const existing = (await store.exists()) ? await store.load() : undefined;

      const config = validateAndNormalizeConfig(
        initializeConfig(existing, {
          stackName: options.stack,
          region: options.region,
          awsProfile: options.profile,
          functionPackage: options.package,
          functionRoleArn: options.roleArn
        }),
        options.config
      );
      await store.save(config);

      spinner.succeed(`${existing ? 'Configuration updated' : 'Configuration file created'}: ${options.config}`);
      console.log(chalk.green('\n✅ Next steps:'));
      if (!config.function_package) {
        console.log(`- Put your packaged function at ${chalk.cyan(DEFAULT_FUNCTION_PACKAGE)} or set ${chalk.cyan('function_package')}`);
      }
      console.log('- Ensure your AWS credentials are configured');
      console.log(`- Run: ${chalk.cyan('hackstack deploy')}`);
    } catch (error) {
      reportError(spinner, 'Initialization failed', error);
    }
  });

for (const step of DEPLOYMENT_STEPS) {
  const { name, description } = STEP_COMMANDS[step];

  program
    .command(name)
    .description(description)
    .option('-c, --config <path>', 'Path to configuration file', resolveConfigPath())
    .option('-v, --verbose', 'Enable verbose logging')
    .action(async (options: ConfigOption & { verbose?: boolean }) => {
      await runOrchestrated(options, `Running ${step} step...`, (orchestrator, config) =>
        orchestrator.runStep(step, config)
      );
    });
}

program
  .command('deploy')
  .description('Run every step not yet completed, in order')
  .option('-c, --config <path>', 'Path to configuration file', resolveConfigPath())
  .option('--from <step>', `Re-run from this step (${DEPLOYMENT_STEPS.join(', ')})`, parseStep)
  .option('--dry-run', 'Simulate the run in memory without touching AWS or the config file')
  .option('-v, --verbose', 'Enable verbose logging')
  .action(async (options: DeployCommandOptions) => {
    await runOrchestrated(options, 'Starting deployment...', (orchestrator, config) =>
      orchestrator.deploy(config, { fromStep: options.from })
    );
  });

program
  .command('status')
  .description('Show the provisioned identifiers and the next step')
  .option('-c, --config <path>', 'Path to configuration file', resolveConfigPath())
  .action(async (options: ConfigOption) => {
    const spinner = ora('Reading configuration...').start();

    try {
      const store = createConfigStore(options.config);
      const config = await store.load();
      const next = resumePoint(config);

      spinner.succeed(`Stack ${chalk.cyan(config.stack_name)} in ${config.region}`);
      for (const step of DEPLOYMENT_STEPS) {
        const identifier = config[STEP_OUTPUT_FIELD[step]];
        console.log(`  ${step.padEnd(9)} ${identifier ? chalk.green(identifier) : chalk.gray('not provisioned')}`);
      }
      if (config.api_endpoint) {
        console.log(`\n🌐 ${chalk.underline(config.api_endpoint)}`);
      }
      console.log(next ? `\nNext step: ${chalk.cyan(next)}` : chalk.green('\n✅ All steps completed'));
    } catch (error) {
      reportError(spinner, 'Status check failed', error);
    }
  });

// Error handling for unknown commands
program.on('command:*', () => {
  console.error(chalk.red('❌ Invalid command. See --help for available commands.'));
  process.exit(1);
});

// Show help if no command provided
if (!process.argv.slice(2).length) {
  program.outputHelp();
} else {
  program.parseAsync().catch((error: unknown) => {
    console.error(chalk.red('❌ Error:'), errorMessage(error));
    process.exit(1);
  });
}
