import eslint from "@eslint/js";
import eslintConfigPrettier from "eslint-config-prettier";
import eslintPluginImportX from "eslint-plugin-import-x";
import tseslint from "typescript-eslint";

import type { TSESLint } from "@typescript-eslint/utils";

//plugins define new eslint rules, and configs set whether or not (and how) the rules should be applied.
const configs: TSESLint.FlatConfig.ConfigArray = [
  eslint.configs.recommended,
  ...tseslint.configs.recommendedTypeChecked,
  ...tseslint.configs.stylisticTypeChecked,
  eslintPluginImportX.flatConfigs.recommended,
  eslintPluginImportX.flatConfigs.typescript,
  {
    rules: {
      //exempt names starting with _ from no-unused-vars, the way TypeScript does.
      "@typescript-eslint/no-unused-vars": [
        "error",
        {
          args: "all",
          argsIgnorePattern: "^_",
          caughtErrors: "all",
          caughtErrorsIgnorePattern: "^_",
          destructuredArrayIgnorePattern: "^_",
          varsIgnorePattern: "^_",
          ignoreRestSiblings: true,
        },
      ],
      //an Option is an object and always truthy; conditions must collapse it first.
      "@typescript-eslint/strict-boolean-expressions": [
        "error",
        {
          allowString: false,
          allowNumber: false,
          allowNullableObject: false,
        },
      ],
    },
  },
  {
    files: ["**/*.test.ts", "**/*.test.mts"],
    rules: {
      "@typescript-eslint/unbound-method": "off",
    },
  },
  //Turns off all rules that are unnecessary or might conflict with Prettier.
  //Note that this config only turns rules off,
  //so it only makes sense using it together with some other config.
  eslintConfigPrettier,
];

export default configs;
