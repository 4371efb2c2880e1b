import chalk from 'chalk';

// Test workers have no TTY; force basic colors.
chalk.level = 1;
