import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { serveCommand } from './cmd/serve';
import { validateCommand } from './cmd/validate';
import { Installation } from './installation';

export async function cli(args: string[]): Promise<void> {
  await yargs(hideBin(['node', 'cli', ...args]))
    .scriptName('mcp-relay')
    .usage('$0 <command> [options]')
    .parserConfiguration({ 'populate--': true })
    .command(serveCommand)
    .command(validateCommand)
    .demandCommand(1, 'You need to specify a command')
    .strict()
    .help()
    .version(Installation.VERSION)
    .parseAsync();
}
