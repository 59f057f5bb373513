// Keep test output quiet and off the filesystem.
process.env.WORKFLOW_LOG_LEVEL = 'ERROR';
process.env.WORKFLOW_FILE_LOGGING_ENABLED = 'false';
process.env.WORKFLOW_CONSOLE_OUTPUT = 'none';
