import { AutoLoad, Command, Declare } from "seyfert";

@Declare({
  name: "sync",
  description: "Cross-server role and punishment sync",
  defaultMemberPermissions: ["ModerateMembers"],
  contexts: ["Guild"],
  integrationTypes: ["GuildInstall"],
})
@AutoLoad()
export default class SyncParentCommand extends Command {}
