import { isInvalidInputError } from '@backend/errors'
import chalk from 'chalk'
import { budgetCommand } from './commands/budget'
import { pointingCommand } from './commands/pointing'

const HELP_TEXT = `
${chalk.bold.cyan('Link Budget Calculator')}

${chalk.bold('Usage:')}
  npm start -- <command> [options]

${chalk.bold('Commands:')}
  ${chalk.green('budget')}    Compute a satellite or radar link budget (default)
  ${chalk.green('pointing')}  Compute look angles and slant range only
  ${chalk.green('help')}      Show this help message

${chalk.bold('Budget options:')}
  --eirp <dBW> | --tx-power <dBW> with --tx-dish-size <m> | --tx-dish-gain <dBi>
  --freq <Hz> --if-bw <Hz>
  --rx-dish-size <m> | --rx-dish-gain <dBi>
  --antenna-noise-temp <K>
  --lnb-noise-fig <dB> | --lnb-noise-temp <K>   --lnb-gain <dB>
  --coax-length <ft> --rx-noise-fig <dB>
  --sat-long <deg> --rx-long <deg> --rx-lat <deg> [--rx-height <m>]
  --radar --radar-alt <m> --radar-cross-section <m²> [--radar-bistatic]
  --model ellipsoidal|spherical   --json

${chalk.bold('Pointing options:')}
  --sat-long <deg> --rx-long <deg> --rx-lat <deg> [--alt <m>] [--rx-height <m>]
  --model ellipsoidal|spherical   --json

  With --json, a value the geometry leaves undefined (the spherical azimuth
  directly below the satellite) prints as null.

${chalk.bold('Examples:')}
  npm run budget -- --eirp 52 --freq 12.016e9 --if-bw 24e6 --rx-dish-size 0.46 \\
    --antenna-noise-temp 20 --lnb-noise-fig 0.6 --lnb-gain 40 --coax-length 110 \\
    --rx-noise-fig 10 --sat-long -101 --rx-long -82.43 --rx-lat 29.71
  npm run pointing -- --sat-long -101 --rx-long -82.43 --rx-lat 29.71

${chalk.bold('Environment:')}
  LOG_LEVEL, POINTING_MODEL, OUTPUT_FORMAT, COAX_LOSS_DB_PER_FT, COAX_LINE_TEMP_K
`

function main(): void {
  const command = process.argv[2] || 'budget'
  const args = process.argv.slice(3)

  switch (command) {
    case 'budget':
      budgetCommand(args)
      break

    case 'pointing':
      pointingCommand(args)
      break

    case 'help':
    case '--help':
    case '-h':
      console.log(HELP_TEXT)
      break

    default:
      if (command.startsWith('--')) {
        budgetCommand(process.argv.slice(2))
        break
      }
      console.error(chalk.red(`Unknown command: ${command}`))
      console.log(HELP_TEXT)
      process.exit(1)
  }
}

try {
  main()
} catch (error) {
  if (isInvalidInputError(error)) {
    console.error(chalk.red(`${error.message}:`))
    for (const issue of error.issues) {
      console.error(chalk.red(`  ${issue}`))
    }
    process.exit(1)
  }
  console.error(chalk.red('Fatal error:'), error)
  process.exit(1)
}
