export interface Config {
    /** when true, warnings raised while scanning are not printed */
    silent: boolean;
}

export const g_config: Config = {
    silent: false
};
