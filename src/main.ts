import { createCliModule } from './adapters/Cli';

const cli = createCliModule({
  io: {
    writeOut: (line) => {
      process.stdout.write(`${line}\n`);
    },
    writeErr: (line) => {
      process.stderr.write(`${line}\n`);
    },
  },
});

cli
  .run(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    process.stderr.write(`Crossword engine crashed: ${String(error)}\n`);
    process.exitCode = 1;
  });
