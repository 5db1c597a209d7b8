// Keep provider contract tests hermetic: ambient base-URL overrides would
// route SDK requests away from the hosts nock intercepts.
delete process.env.ANTHROPIC_BASE_URL;
delete process.env.OPENAI_BASE_URL;
