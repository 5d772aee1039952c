// Plain output and quiet diagnostics for every test file.
process.env.NO_COLOR = '1';
delete process.env.FORCE_COLOR;
process.env.LOG_LEVEL = 'silent';
