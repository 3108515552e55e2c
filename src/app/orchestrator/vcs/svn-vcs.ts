/**
 * Subversion-backed VCS adapter.
 * Purpose: map CentralizedVcs calls to the svn helpers.
 * Assumptions: svn is on PATH; every call names its working copy.
 */

import {
  checkoutEmpty,
  cleanup,
  externals,
  info,
  revert,
  switchUrl,
  update,
} from "../../../svn/svn.js";
import type { CentralizedVcs } from "../ports.js";

export function createSvnVcs(): CentralizedVcs {
  return {
    checkoutEmpty,
    info,
    cleanup,
    switchUrl,
    update,
    revert,
    externals,
  };
}
