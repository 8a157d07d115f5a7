#!/usr/bin/env node

import { handle, run } from '@oclif/core';

run()
  .then(() => {
    // CLI completed successfully
  })
  .catch(handle);
